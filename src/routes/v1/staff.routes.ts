import { Router } from 'express';
import { createStaffController } from '../../controllers/staff.controller';
import { authorizeAction } from '../../middleware/role.middleware';
import { PolicyAction, PolicyResource } from '../../utils/rolePolicy';
import { validate } from '../../middleware/validate.middleware';
import { addStaffSchema, updateStaffSchema } from '../../validators/user.validator';
import { RouteDeps } from './deps';

export const createStaffRouter = ({ services, authenticate }: RouteDeps): Router => {
  const router = Router();
  const controller = createStaffController(services);

  // Shares the /auth prefix with other routers, so authentication is per route.
  const guard = (action: PolicyAction, resource: PolicyResource) => [authenticate, authorizeAction(action, resource)];

  /**
   * @swagger
   * /auth/add-staff:
   *   post:
   *     tags: [Staff]
   *     summary: Create a staff user together with their profile
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [email, password, firstName, lastName, staffId]
   *             properties:
   *               email:
   *                 type: string
   *               password:
   *                 type: string
   *               firstName:
   *                 type: string
   *               lastName:
   *                 type: string
   *               staffId:
   *                 type: string
   *                 pattern: '^[A-Z0-9]+$'
   *               department:
   *                 type: string
   *               designation:
   *                 type: string
   *               qualification:
   *                 type: string
   *               salary:
   *                 type: number
   *     responses:
   *       201:
   *         description: Staff added successfully
   */
  router.post('/add-staff', guard('create', 'staff'), validate(addStaffSchema), controller.add);

  /**
   * @swagger
   * /auth/staff:
   *   get:
   *     tags: [Staff]
   *     summary: List staff, newest first
   *     responses:
   *       200:
   *         description: "`{ count, items }`"
   */
  router.get('/staff', guard('list', 'staff'), controller.list);

  /**
   * @swagger
   * /auth/staff/{staffId}:
   *   parameters:
   *     - in: path
   *       name: staffId
   *       required: true
   *       schema:
   *         type: string
   *   get:
   *     tags: [Staff]
   *     summary: Get a staff member by Staff ID
   *     responses:
   *       200:
   *         description: Staff retrieved successfully
   *   put:
   *     tags: [Staff]
   *     summary: Update a staff member and the owning user's name or email
   *     responses:
   *       200:
   *         description: Staff updated successfully
   *   patch:
   *     tags: [Staff]
   *     summary: Same as PUT; every field is optional
   *     responses:
   *       200:
   *         description: Staff updated successfully
   *   delete:
   *     tags: [Staff]
   *     summary: Delete the staff profile and its user, applying the HOD delete policy
   *     responses:
   *       200:
   *         description: Staff deleted successfully
   *       409:
   *         description: Staff member is an active HOD and the policy is `block`
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Error'
   */
  router.get('/staff/:staffId', guard('read', 'staff'), controller.get);
  router.put('/staff/:staffId', guard('update', 'staff'), validate(updateStaffSchema), controller.update);
  router.patch('/staff/:staffId', guard('update', 'staff'), validate(updateStaffSchema), controller.update);
  router.delete('/staff/:staffId', guard('delete', 'staff'), controller.remove);

  return router;
};
