import { Router } from 'express';
import { VolunteersController } from '../controllers/volunteers.controller';
import type { VolunteerService } from '../../services/volunteers/volunteer.service';
import { requireAccess } from '../middleware/auth.middleware';
import { validate } from '../middleware/validation.middleware';
import { idParamsValidator } from '../validators/admin.validators';
import {
  volunteerListQueryValidator,
  volunteerValidator,
} from '../validators/volunteer.validators';

/**
 * Public routes: signup submission and taxonomy listing, mounted at /api
 */
export function createVolunteerRoutes(service: VolunteerService): Router {
  const router = Router();
  const controller = new VolunteersController(service);

  router.post(
    '/volunteers',
    requireAccess('submitSignup'),
    validate({ body: volunteerValidator }),
    (req, res, next) => controller.submit(req, res, next)
  );

  router.get('/ministry-areas', requireAccess('listTaxonomy'), (req, res, next) =>
    controller.taxonomy(req, res, next)
  );

  return router;
}

/**
 * Admin routes, mounted at /api/admin/volunteers
 */
export function createAdminVolunteerRoutes(service: VolunteerService): Router {
  const router = Router();
  const controller = new VolunteersController(service);

  router.get(
    '/',
    requireAccess('listVolunteers'),
    validate({ query: volunteerListQueryValidator }),
    (req, res, next) => controller.list(req, res, next)
  );

  router.put(
    '/:id',
    requireAccess('updateVolunteer'),
    validate({ params: idParamsValidator, body: volunteerValidator }),
    (req, res, next) => controller.update(req, res, next)
  );

  return router;
}
