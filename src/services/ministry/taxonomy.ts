import { logger } from '../../config/logger';
import type { MinistrySelection } from '../../models/volunteer.model';
import { customMinistryAreaRepository } from '../../repositories/custom-ministry-area.repository';

export const BUILT_IN_MINISTRY_AREAS: Readonly<Record<string, readonly string[]>> = {
  "Children's Ministry": ['Childcare and/or Teaching', 'VBS'],
  Hospitality: ['Greeters', 'Make Contact with Visitors', 'Kitchen Cleanup'],
  Media: ['Sound, etc.', 'Social Media'],
  'Mission Trips': ['BBQ Fundraisers'],
  'Member Care': ['Meal Trains for members in need', 'Help for Elderly/Widows'],
  'Community Outreach': ['Trunk or Treat', 'Easter Event', 'New Outreach Programs'],
  'Building/Grounds': ['Maintenance', 'Security'],
  'Recurring Service Events': [
    '318 Church (Third Saturday)',
    '5 Loaves 2 Fish (Thursday before 1st Saturday)',
  ],
};

export interface TaxonomyListing {
  categories: Record<string, string[]>;
}

/**
 * Ordered category -> areas catalog. Instances never change once built.
 */
export class MinistryTaxonomy {
  private readonly areasByCategory: ReadonlyMap<string, readonly string[]>;

  constructor(table: Readonly<Record<string, readonly string[]>> = BUILT_IN_MINISTRY_AREAS) {
    const entries = Object.entries(table).map(
      ([category, areas]): [string, readonly string[]] => [category, Object.freeze([...areas])]
    );
    this.areasByCategory = new Map(entries);
  }

  get categories(): string[] {
    return [...this.areasByCategory.keys()];
  }

  hasCategory(category: string): boolean {
    return this.areasByCategory.has(category);
  }

  /**
   * @returns Areas of a category, or undefined for an unknown category
   */
  areasOf(category: string): readonly string[] | undefined {
    return this.areasByCategory.get(category);
  }

  /**
   * New taxonomy with custom areas appended to their categories.
   * Entries under an unknown category and areas already present are skipped.
   */
  withCustomAreas(custom: readonly MinistrySelection[]): MinistryTaxonomy {
    const table = new Map<string, string[]>();
    for (const [category, areas] of this.areasByCategory) {
      table.set(category, [...areas]);
    }

    for (const { category, area } of custom) {
      const areas = table.get(category);
      if (!areas) {
        logger.warn({ category, area }, 'Ignoring custom ministry area with unknown category');
        continue;
      }
      if (!areas.includes(area)) {
        areas.push(area);
      }
    }

    return new MinistryTaxonomy(Object.fromEntries(table));
  }

  toJSON(): TaxonomyListing {
    const categories: Record<string, string[]> = {};
    for (const [category, areas] of this.areasByCategory) {
      categories[category] = [...areas];
    }
    return { categories };
  }
}

/**
 * Build the process taxonomy: the built-in table plus persisted custom areas
 */
export async function loadTaxonomy(): Promise<MinistryTaxonomy> {
  const custom = await customMinistryAreaRepository.findAll();
  const taxonomy = new MinistryTaxonomy().withCustomAreas(custom);

  logger.info(
    { categories: taxonomy.categories.length, customAreas: custom.length },
    'Ministry taxonomy loaded'
  );
  return taxonomy;
}
