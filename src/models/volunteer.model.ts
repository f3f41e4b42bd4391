/**
 * A (category, area) pair chosen by a volunteer
 */
export interface MinistrySelection {
  category: string;
  area: string;
}

/**
 * Volunteer signup record with its ministry selections
 */
export interface Volunteer {
  id: number;
  name: string;
  phone: string;
  email: string;
  signupDate: Date;
  createdAt: Date;
  updatedAt: Date;
  ministries: MinistrySelection[];
}

export interface CreateVolunteer {
  name: string;
  phone: string;
  email: string;
  ministries: MinistrySelection[];
}

/**
 * Replacement data for an existing signup; `ministries` replaces the whole set
 */
export type UpdateVolunteer = CreateVolunteer;

export type VolunteerSortField = 'name' | 'date' | 'ministry';

export interface VolunteerListFilters {
  ministryArea?: string;
  category?: string;
  sortBy?: VolunteerSortField;
}
