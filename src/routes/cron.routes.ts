import { Router } from 'express';
import { CronController } from '../controllers/cron.controller';

export function createCronRouter(cronController: CronController): Router {
  const router = Router();

  // No authentication middleware; the controller checks the cron secret header
  router.post('/expire-invitations', cronController.expireInvitations.bind(cronController));
  router.get('/expire-invitations', cronController.expireInvitations.bind(cronController));

  return router;
}
