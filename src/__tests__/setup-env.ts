// Runs before each test file, ahead of the env module's first parse
process.env.NODE_ENV = 'test';
process.env.DATABASE_URL = '';
process.env.JWT_SECRET = 'test-secret';
process.env.ACCESS_TOKEN_EXPIRE_MINUTES = '30';
process.env.BCRYPT_ROUNDS = '4';
process.env.STRIPE_SECRET_KEY = 'sk_test_placeholder';
process.env.STRIPE_WEBHOOK_SECRET = 'whsec_test_secret';
process.env.FRONTEND_URL = 'http://localhost:3000';
process.env.CRON_SECRET = 'test-cron-secret';
process.env.RATE_LIMIT_ENABLED = 'true';
