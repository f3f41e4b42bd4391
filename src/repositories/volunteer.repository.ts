import { asc, desc, eq, inArray, type SQL } from 'drizzle-orm';
import { db, type AppTransaction } from '../db';
import { volunteerMinistries, volunteers, type VolunteerRow } from '../db/schema';
import type {
  CreateVolunteer,
  MinistrySelection,
  UpdateVolunteer,
  Volunteer,
  VolunteerListFilters,
} from '../models/volunteer.model';

function toVolunteer(row: VolunteerRow, ministries: MinistrySelection[]): Volunteer {
  return {
    id: row.id,
    name: row.name,
    phone: row.phone,
    email: row.email,
    signupDate: new Date(row.signupDate),
    createdAt: new Date(row.createdAt),
    updatedAt: new Date(row.updatedAt),
    ministries,
  };
}

function insertSelections(tx: AppTransaction, volunteerId: number, selections: MinistrySelection[]): void {
  if (selections.length === 0) return;

  tx.insert(volunteerMinistries)
    .values(
      selections.map((selection) => ({
        volunteerId,
        category: selection.category,
        ministryArea: selection.area,
      }))
    )
    .run();
}

export class VolunteerRepository {
  /**
   * Insert a volunteer and its selections as one unit
   */
  async create(data: CreateVolunteer): Promise<Volunteer> {
    return db.transaction((tx) => {
      const row = tx
        .insert(volunteers)
        .values({ name: data.name, phone: data.phone, email: data.email })
        .returning()
        .get();

      insertSelections(tx, row.id, data.ministries);

      return toVolunteer(row, [...data.ministries]);
    });
  }

  /**
   * Find volunteer by ID with ministries
   */
  async findById(id: number): Promise<Volunteer | undefined> {
    const result = await db.select().from(volunteers).where(eq(volunteers.id, id)).limit(1);
    if (!result[0]) return undefined;

    const ministries = await this.findMinistries([id]);
    return toVolunteer(result[0], ministries.get(id) ?? []);
  }

  /**
   * List volunteers. A ministry-area filter takes precedence over a category filter.
   * Sorting: `name` ascending, `date` newest first, `ministry` most selections first.
   */
  async findAll(filters: VolunteerListFilters = {}): Promise<Volunteer[]> {
    let condition: SQL | undefined;
    if (filters.ministryArea) {
      condition = inArray(
        volunteers.id,
        db
          .select({ id: volunteerMinistries.volunteerId })
          .from(volunteerMinistries)
          .where(eq(volunteerMinistries.ministryArea, filters.ministryArea))
      );
    } else if (filters.category) {
      condition = inArray(
        volunteers.id,
        db
          .select({ id: volunteerMinistries.volunteerId })
          .from(volunteerMinistries)
          .where(eq(volunteerMinistries.category, filters.category))
      );
    }

    const rows = await db
      .select()
      .from(volunteers)
      .where(condition)
      .orderBy(
        ...(filters.sortBy === 'name'
          ? [asc(volunteers.name), asc(volunteers.id)]
          : [desc(volunteers.signupDate), desc(volunteers.id)])
      );

    const ministries = await this.findMinistries(rows.map((row) => row.id));
    const result = rows.map((row) => toVolunteer(row, ministries.get(row.id) ?? []));

    if (filters.sortBy === 'ministry') {
      // Array.prototype.sort is stable, so ties keep newest-first order
      result.sort((a, b) => b.ministries.length - a.ministries.length);
    }

    return result;
  }

  /**
   * Overwrite contact fields and replace the full selection set.
   * Old selections are deleted and new ones inserted in the same transaction.
   */
  async replace(id: number, data: UpdateVolunteer): Promise<Volunteer | undefined> {
    return db.transaction(
      (tx) => {
        const row = tx
          .update(volunteers)
          .set({
            name: data.name,
            phone: data.phone,
            email: data.email,
            updatedAt: new Date().toISOString(),
          })
          .where(eq(volunteers.id, id))
          .returning()
          .get();

        if (!row) return undefined;

        tx.delete(volunteerMinistries).where(eq(volunteerMinistries.volunteerId, id)).run();
        insertSelections(tx, id, data.ministries);

        return toVolunteer(row, [...data.ministries]);
      },
      { behavior: 'immediate' }
    );
  }

  private async findMinistries(volunteerIds: number[]): Promise<Map<number, MinistrySelection[]>> {
    const byVolunteer = new Map<number, MinistrySelection[]>();
    if (volunteerIds.length === 0) return byVolunteer;

    const rows = await db
      .select()
      .from(volunteerMinistries)
      .where(inArray(volunteerMinistries.volunteerId, volunteerIds))
      .orderBy(asc(volunteerMinistries.id));

    for (const row of rows) {
      const list = byVolunteer.get(row.volunteerId) ?? [];
      list.push({ category: row.category, area: row.ministryArea });
      byVolunteer.set(row.volunteerId, list);
    }

    return byVolunteer;
  }
}

export const volunteerRepository = new VolunteerRepository();
