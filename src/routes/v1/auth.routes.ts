import { Router } from 'express';
import { createAuthController } from '../../controllers/auth.controller';
import { authorizeAction } from '../../middleware/role.middleware';
import { validate } from '../../middleware/validate.middleware';
import { loginSchema, refreshSchema, registerSchema } from '../../validators/auth.validator';
import { RouteDeps } from './deps';

export const createAuthRouter = ({ services, authenticate, limiters }: RouteDeps): Router => {
  const router = Router();
  const controller = createAuthController(services);

  /**
   * @swagger
   * /auth/register:
   *   post:
   *     tags: [Authentication]
   *     summary: Register a student or staff account
   *     security: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [email, password, password2, firstName, lastName, role]
   *             properties:
   *               email:
   *                 type: string
   *               password:
   *                 type: string
   *                 minLength: 8
   *               password2:
   *                 type: string
   *               firstName:
   *                 type: string
   *               lastName:
   *                 type: string
   *               role:
   *                 type: string
   *                 enum: [student, staff]
   *     responses:
   *       201:
   *         description: Registration successful; returns the user and a token pair
   *       400:
   *         description: Validation failed
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Error'
   */
  router.post('/register', limiters.auth, validate(registerSchema), controller.register);

  /**
   * @swagger
   * /auth/login:
   *   post:
   *     tags: [Authentication]
   *     summary: Exchange credentials for a token pair
   *     security: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [email, password]
   *             properties:
   *               email:
   *                 type: string
   *               password:
   *                 type: string
   *     responses:
   *       200:
   *         description: Login successful
   *       401:
   *         description: Invalid email or password
   *       403:
   *         description: Account disabled
   */
  router.post('/login', limiters.auth, validate(loginSchema), controller.login);

  /**
   * @swagger
   * /auth/token/refresh:
   *   post:
   *     tags: [Authentication]
   *     summary: Issue a new access token from a refresh token
   *     security: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [refresh]
   *             properties:
   *               refresh:
   *                 type: string
   *     responses:
   *       200:
   *         description: Token refreshed successfully
   */
  router.post('/token/refresh', validate(refreshSchema), controller.refresh);

  /**
   * @swagger
   * /auth/profile:
   *   get:
   *     tags: [Authentication]
   *     summary: Current user with their student or staff profile
   *     responses:
   *       200:
   *         description: Profile retrieved successfully
   */
  router.get('/profile', authenticate, authorizeAction('read', 'profile'), controller.profile);

  return router;
};
