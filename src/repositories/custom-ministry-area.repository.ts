import { asc } from 'drizzle-orm';
import { db } from '../db';
import { customMinistryAreas } from '../db/schema';
import type { MinistrySelection } from '../models/volunteer.model';

export class CustomMinistryAreaRepository {
  /**
   * All persisted custom areas in insertion order
   */
  async findAll(): Promise<MinistrySelection[]> {
    const rows = await db
      .select({ category: customMinistryAreas.category, area: customMinistryAreas.ministryArea })
      .from(customMinistryAreas)
      .orderBy(asc(customMinistryAreas.id));

    return rows;
  }
}

export const customMinistryAreaRepository = new CustomMinistryAreaRepository();
