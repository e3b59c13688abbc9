import { Router } from 'express';
import { createHodController } from '../../controllers/hod.controller';
import { authorizeAction } from '../../middleware/role.middleware';
import { PolicyAction, PolicyResource } from '../../utils/rolePolicy';
import { validate } from '../../middleware/validate.middleware';
import {
  appointHodSchema,
  departmentParamSchema,
  hodIdSchema,
  hodListSchema,
  updateHodSchema,
} from '../../validators/hod.validator';
import { RouteDeps } from './deps';

export const createHodRouter = ({ services, authenticate }: RouteDeps): Router => {
  const router = Router();
  const controller = createHodController(services);

  // Shares the /auth prefix with other routers, so authentication is per route.
  const guard = (action: PolicyAction, resource: PolicyResource) => [authenticate, authorizeAction(action, resource)];

  /**
   * @swagger
   * /auth/hods:
   *   get:
   *     tags: [HOD]
   *     summary: List HOD appointments by department, active first, latest start first
   *     parameters:
   *       - in: query
   *         name: department
   *         schema:
   *           type: string
   *       - in: query
   *         name: isActive
   *         schema:
   *           type: string
   *           enum: ['true', 'false']
   *     responses:
   *       200:
   *         description: "`{ count, items }`"
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/List'
   *   post:
   *     tags: [HOD]
   *     summary: Appoint a staff member as head of a department
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [staff, department]
   *             properties:
   *               staff:
   *                 type: string
   *                 description: User id of the staff member
   *               department:
   *                 type: string
   *               startDate:
   *                 type: string
   *                 format: date-time
   *               notes:
   *                 type: string
   *               supersede:
   *                 type: boolean
   *                 description: Retire the current head instead of failing
   *     responses:
   *       201:
   *         description: HOD appointed successfully
   *       409:
   *         description: Department already has a head, or the staff member already heads one
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Error'
   */
  router.get('/hods', guard('list', 'hod'), validate(hodListSchema), controller.list);
  router.post('/hods', guard('create', 'hod'), validate(appointHodSchema), controller.appoint);

  /**
   * @swagger
   * /auth/hods/{id}:
   *   parameters:
   *     - in: path
   *       name: id
   *       required: true
   *       schema:
   *         type: string
   *   get:
   *     tags: [HOD]
   *     summary: Get an HOD appointment
   *     responses:
   *       200:
   *         description: HOD record retrieved successfully
   *   put:
   *     tags: [HOD]
   *     summary: Change notes or start date, retire with isActive false, or move to another department
   *     responses:
   *       200:
   *         description: The resulting appointment (a new one after a department change)
   *   patch:
   *     tags: [HOD]
   *     summary: Same as PUT
   *     responses:
   *       200:
   *         description: HOD record updated successfully
   *   delete:
   *     tags: [HOD]
   *     summary: Retire the appointment; the record is kept
   *     responses:
   *       200:
   *         description: HOD retired successfully
   */
  router.get('/hods/:id', guard('read', 'hod'), validate(hodIdSchema), controller.get);
  router.put('/hods/:id', guard('update', 'hod'), validate(updateHodSchema), controller.update);
  router.patch('/hods/:id', guard('update', 'hod'), validate(updateHodSchema), controller.update);
  router.delete('/hods/:id', guard('delete', 'hod'), validate(hodIdSchema), controller.retire);

  /**
   * @swagger
   * /auth/departments/{department}/hod:
   *   get:
   *     tags: [HOD]
   *     summary: Current head of a department
   *     parameters:
   *       - in: path
   *         name: department
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Current HOD retrieved successfully
   *       404:
   *         description: No active HOD for the department
   */
  router.get(
    '/departments/:department/hod',
    guard('read', 'departmentHod'),
    validate(departmentParamSchema),
    controller.current
  );

  return router;
};
