import type { Request, Response, NextFunction } from 'express';
import type { Volunteer } from '../../models/volunteer.model';
import type { VolunteerService } from '../../services/volunteers/volunteer.service';
import { HttpStatus } from '../../utils/error-codes';
import { idParamsValidator } from '../validators/admin.validators';
import {
  volunteerListQueryValidator,
  type VolunteerInput,
} from '../validators/volunteer.validators';

/**
 * Wire shape of a volunteer; selections use `ministryArea` like the request body
 */
export function toVolunteerResponse(volunteer: Volunteer) {
  return {
    id: volunteer.id,
    name: volunteer.name,
    phone: volunteer.phone,
    email: volunteer.email,
    signupDate: volunteer.signupDate.toISOString(),
    createdAt: volunteer.createdAt.toISOString(),
    updatedAt: volunteer.updatedAt.toISOString(),
    ministries: volunteer.ministries.map((m) => ({ category: m.category, ministryArea: m.area })),
  };
}

export class VolunteersController {
  constructor(private readonly volunteers: VolunteerService) {}

  /**
   * POST /api/volunteers
   */
  async submit(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const input: VolunteerInput = req.body;
      const volunteer = await this.volunteers.submitSignup(input);

      res.status(HttpStatus.CREATED).json({
        success: true,
        data: { volunteer: toVolunteerResponse(volunteer) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/ministry-areas
   */
  async taxonomy(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      res.status(HttpStatus.OK).json({ success: true, data: this.volunteers.listTaxonomy() });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/admin/volunteers
   */
  async list(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const filters = volunteerListQueryValidator.parse(req.query);
      const volunteers = await this.volunteers.listVolunteers(filters);

      res.status(HttpStatus.OK).json({
        success: true,
        data: { volunteers: volunteers.map(toVolunteerResponse), total: volunteers.length },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /api/admin/volunteers/:id
   */
  async update(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { id } = idParamsValidator.parse(req.params);
      const input: VolunteerInput = req.body;
      const volunteer = await this.volunteers.updateVolunteer(id, input);

      res.status(HttpStatus.OK).json({
        success: true,
        data: { volunteer: toVolunteerResponse(volunteer) },
      });
    } catch (error) {
      next(error);
    }
  }
}
