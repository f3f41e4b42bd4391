import { Router } from 'express';
import { adminUsersController } from '../controllers/admin-users.controller';
import { requireAccess } from '../middleware/auth.middleware';
import { validate } from '../middleware/validation.middleware';
import {
  createAdminValidator,
  idParamsValidator,
  updateAdminValidator,
} from '../validators/admin.validators';

const router = Router();

router.get('/', requireAccess('listAdmins'), (req, res, next) =>
  adminUsersController.list(req, res, next)
);

router.post(
  '/',
  requireAccess('createAdmin'),
  validate({ body: createAdminValidator }),
  (req, res, next) => adminUsersController.create(req, res, next)
);

router.patch(
  '/:id',
  requireAccess('updateAdmin'),
  validate({ params: idParamsValidator, body: updateAdminValidator }),
  (req, res, next) => adminUsersController.update(req, res, next)
);

router.post(
  '/:id/transfer-super-admin',
  requireAccess('transferSuperAdmin'),
  validate({ params: idParamsValidator }),
  (req, res, next) => adminUsersController.transferSuperAdmin(req, res, next)
);

export default router;
