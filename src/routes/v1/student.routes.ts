import { Router } from 'express';
import { createStudentController } from '../../controllers/student.controller';
import { authorizeAction } from '../../middleware/role.middleware';
import { PolicyAction, PolicyResource } from '../../utils/rolePolicy';
import { validate } from '../../middleware/validate.middleware';
import { addStudentSchema, updateStudentSchema } from '../../validators/user.validator';
import { RouteDeps } from './deps';

export const createStudentRouter = ({ services, authenticate }: RouteDeps): Router => {
  const router = Router();
  const controller = createStudentController(services);

  // Shares the /auth prefix with other routers, so authentication is per route.
  const guard = (action: PolicyAction, resource: PolicyResource) => [authenticate, authorizeAction(action, resource)];

  /**
   * @swagger
   * /auth/add-student:
   *   post:
   *     tags: [Students]
   *     summary: Create a student user together with their profile
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [email, password, firstName, lastName, studentId]
   *             properties:
   *               email:
   *                 type: string
   *               password:
   *                 type: string
   *               firstName:
   *                 type: string
   *               lastName:
   *                 type: string
   *               studentId:
   *                 type: string
   *                 pattern: '^[A-Z0-9]+$'
   *               department:
   *                 type: string
   *               dateOfBirth:
   *                 type: string
   *                 format: date
   *               gender:
   *                 type: string
   *                 enum: [M, F, O]
   *               phone:
   *                 type: string
   *               address:
   *                 type: string
   *     responses:
   *       201:
   *         description: Student added successfully
   *       403:
   *         description: Only admins and staff may add students
   */
  router.post('/add-student', guard('create', 'student'), validate(addStudentSchema), controller.add);

  /**
   * @swagger
   * /auth/students:
   *   get:
   *     tags: [Students]
   *     summary: List students, newest first
   *     responses:
   *       200:
   *         description: "`{ count, items }`"
   */
  router.get('/students', guard('list', 'student'), controller.list);

  /**
   * @swagger
   * /auth/students/{studentId}:
   *   parameters:
   *     - in: path
   *       name: studentId
   *       required: true
   *       schema:
   *         type: string
   *   get:
   *     tags: [Students]
   *     summary: Get a student by Student ID
   *     responses:
   *       200:
   *         description: Student retrieved successfully
   *       404:
   *         description: Student not found
   *   put:
   *     tags: [Students]
   *     summary: Update a student and the owning user's name or email
   *     responses:
   *       200:
   *         description: Student updated successfully
   *   patch:
   *     tags: [Students]
   *     summary: Same as PUT; every field is optional
   *     responses:
   *       200:
   *         description: Student updated successfully
   *   delete:
   *     tags: [Students]
   *     summary: Delete the student profile and its user
   *     responses:
   *       200:
   *         description: Student deleted successfully
   */
  router.get('/students/:studentId', guard('read', 'student'), controller.get);
  router.put(
    '/students/:studentId',
    guard('update', 'student'),
    validate(updateStudentSchema),
    controller.update
  );
  router.patch(
    '/students/:studentId',
    guard('update', 'student'),
    validate(updateStudentSchema),
    controller.update
  );
  router.delete('/students/:studentId', guard('delete', 'student'), controller.remove);

  return router;
};
