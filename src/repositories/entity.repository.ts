import { eq } from 'drizzle-orm';
import { getDb } from '../config/database';
import { institutions, scholarships } from '../db/schema';
import type { EntityRef } from '../types';

export interface EntityRepository {
  /** Display name of an institution or scholarship, undefined when it does not exist. */
  findName(entity: EntityRef): Promise<string | undefined>;
}

export class DrizzleEntityRepository implements EntityRepository {
  async findName({ entityType, entityId }: EntityRef): Promise<string | undefined> {
    if (entityType === 'institution') {
      const [row] = await getDb()
        .select({ name: institutions.name })
        .from(institutions)
        .where(eq(institutions.id, entityId))
        .limit(1);
      return row?.name;
    }
    const [row] = await getDb()
      .select({ title: scholarships.title })
      .from(scholarships)
      .where(eq(scholarships.id, entityId))
      .limit(1);
    return row?.title;
  }
}
