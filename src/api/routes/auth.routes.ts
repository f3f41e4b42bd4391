import { Router } from 'express';
import { authController } from '../controllers/auth.controller';
import { requireAccess } from '../middleware/auth.middleware';
import { loginRateLimiter } from '../middleware/rate-limit.middleware';
import { validate } from '../middleware/validation.middleware';
import {
  forgotPasswordValidator,
  loginValidator,
  resetPasswordValidator,
} from '../validators/auth.validators';

const router = Router();

/**
 * POST /api/admin/login
 */
router.post(
  '/login',
  loginRateLimiter,
  requireAccess('login'),
  validate({ body: loginValidator }),
  (req, res, next) => authController.login(req, res, next)
);

/**
 * POST /api/admin/logout
 */
router.post('/logout', requireAccess('logout'), (req, res, next) =>
  authController.logout(req, res, next)
);

/**
 * GET /api/admin/me
 */
router.get('/me', requireAccess('getCurrentAdmin'), (req, res, next) =>
  authController.getCurrentAdmin(req, res, next)
);

/**
 * POST /api/admin/forgot-password
 */
router.post(
  '/forgot-password',
  loginRateLimiter,
  requireAccess('requestPasswordReset'),
  validate({ body: forgotPasswordValidator }),
  (req, res, next) => authController.forgotPassword(req, res, next)
);

/**
 * POST /api/admin/reset-password
 */
router.post(
  '/reset-password',
  loginRateLimiter,
  requireAccess('completePasswordReset'),
  validate({ body: resetPasswordValidator }),
  (req, res, next) => authController.resetPassword(req, res, next)
);

export default router;
