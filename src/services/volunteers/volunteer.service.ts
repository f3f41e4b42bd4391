import { env } from '../../config/environment';
import { logger } from '../../config/logger';
import type {
  CreateVolunteer,
  UpdateVolunteer,
  Volunteer,
  VolunteerListFilters,
} from '../../models/volunteer.model';
import { volunteerRepository } from '../../repositories/volunteer.repository';
import { NotFoundError } from '../../utils/app-error';
import { ErrorCodes } from '../../utils/error-codes';
import type { MinistryTaxonomy, TaxonomyListing } from '../ministry/taxonomy';
import { TaxonomyValidator } from '../ministry/taxonomy-validator';
import { dispatchInBackground, emailService, type EmailService } from '../notifications/email.service';

export interface VolunteerServiceOptions {
  mailer?: EmailService;
  notificationRecipients?: string[];
}

/**
 * Volunteer signups: public submission plus admin listing and editing
 */
export class VolunteerService {
  private readonly validator: TaxonomyValidator;
  private readonly mailer: EmailService;
  private readonly recipients: string[];

  constructor(
    private readonly taxonomy: MinistryTaxonomy,
    options: VolunteerServiceOptions = {}
  ) {
    this.validator = new TaxonomyValidator(taxonomy);
    this.mailer = options.mailer ?? emailService;
    this.recipients = options.notificationRecipients ?? env.ADMIN_NOTIFICATION_EMAILS;
  }

  /**
   * Validate selections, store the signup, then notify admins without waiting
   * @throws InvalidRequestError for a selection outside the taxonomy
   */
  async submitSignup(data: CreateVolunteer): Promise<Volunteer> {
    this.validator.assertValid(data.ministries);

    const volunteer = await volunteerRepository.create(data);
    logger.info(
      { volunteerId: volunteer.id, selections: volunteer.ministries.length },
      'Volunteer signup received'
    );

    dispatchInBackground(
      this.mailer.notifyNewSignup(this.recipients, {
        name: volunteer.name,
        phone: volunteer.phone,
        email: volunteer.email,
        signupDate: volunteer.signupDate,
        ministries: volunteer.ministries,
      }),
      { volunteerId: volunteer.id, kind: 'new-signup' }
    );

    return volunteer;
  }

  async listVolunteers(filters: VolunteerListFilters = {}): Promise<Volunteer[]> {
    return volunteerRepository.findAll(filters);
  }

  /**
   * Replace contact details and the whole selection set
   */
  async updateVolunteer(id: number, data: UpdateVolunteer): Promise<Volunteer> {
    this.validator.assertValid(data.ministries);

    const volunteer = await volunteerRepository.replace(id, data);
    if (!volunteer) {
      throw new NotFoundError('Volunteer not found', ErrorCodes.VOLUNTEER_NOT_FOUND);
    }

    logger.info({ volunteerId: id }, 'Volunteer updated');
    return volunteer;
  }

  listTaxonomy(): TaxonomyListing {
    return this.taxonomy.toJSON();
  }
}
