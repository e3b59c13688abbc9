import { Router } from 'express';
import { createSyllabusController } from '../../controllers/syllabus.controller';
import { authorizeAction } from '../../middleware/role.middleware';
import { validate } from '../../middleware/validate.middleware';
import {
  catalogListSchema,
  createSubjectSchema,
  departmentSubjectsSchema,
  idSchema,
  updateSubjectSchema,
  updateSyllabusSchema,
  upsertSyllabusSchema,
} from '../../validators/catalog.validator';
import { RouteDeps } from './deps';

export const createSyllabusRouter = ({ services, authenticate }: RouteDeps): Router => {
  const router = Router();
  const controller = createSyllabusController(services);

  router.use(authenticate);

  /**
   * @swagger
   * /syllabus/subjects:
   *   get:
   *     tags: [Catalog]
   *     summary: List subjects by department, semester and code
   *     parameters:
   *       - in: query
   *         name: department
   *         schema:
   *           type: string
   *       - in: query
   *         name: semester
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: "`{ count, items }`"
   *   post:
   *     tags: [Catalog]
   *     summary: Create a subject; its code is generated
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [name, department, semester]
   *             properties:
   *               name:
   *                 type: string
   *               department:
   *                 type: string
   *                 enum: [CS, ECE, EE, MECH, CIVIL, IT]
   *               semester:
   *                 type: integer
   *                 minimum: 1
   *                 maximum: 8
   *               pdfUrl:
   *                 type: string
   *                 description: Creates the subject's syllabus as well
   *     responses:
   *       201:
   *         description: Subject created successfully
   */
  router.get('/subjects', authorizeAction('list', 'subject'), validate(catalogListSchema), controller.listSubjects);
  router.post('/subjects', authorizeAction('create', 'subject'), validate(createSubjectSchema), controller.createSubject);

  /**
   * @swagger
   * /syllabus/subjects/{id}:
   *   parameters:
   *     - in: path
   *       name: id
   *       required: true
   *       schema:
   *         type: string
   *   get:
   *     tags: [Catalog]
   *     summary: Get a subject
   *     responses:
   *       200:
   *         description: Subject retrieved successfully
   *   put:
   *     tags: [Catalog]
   *     summary: Update a subject; pdfUrl creates or replaces its syllabus
   *     responses:
   *       200:
   *         description: Subject updated successfully
   *   patch:
   *     tags: [Catalog]
   *     summary: Same as PUT
   *     responses:
   *       200:
   *         description: Subject updated successfully
   *   delete:
   *     tags: [Catalog]
   *     summary: Delete a subject and its syllabus
   *     responses:
   *       200:
   *         description: Subject deleted successfully
   */
  router.get('/subjects/:id', authorizeAction('read', 'subject'), validate(idSchema), controller.getSubject);
  router.put('/subjects/:id', authorizeAction('update', 'subject'), validate(updateSubjectSchema), controller.updateSubject);
  router.patch('/subjects/:id', authorizeAction('update', 'subject'), validate(updateSubjectSchema), controller.updateSubject);
  router.delete('/subjects/:id', authorizeAction('delete', 'subject'), validate(idSchema), controller.deleteSubject);

  /**
   * @swagger
   * /syllabus/syllabi:
   *   get:
   *     tags: [Catalog]
   *     summary: List syllabi, optionally by department and semester
   *     responses:
   *       200:
   *         description: "`{ count, items }`"
   *   post:
   *     tags: [Catalog]
   *     summary: Upload a subject's syllabus, replacing the existing one
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [subject, pdfUrl]
   *             properties:
   *               subject:
   *                 type: string
   *               pdfUrl:
   *                 type: string
   *     responses:
   *       201:
   *         description: Syllabus uploaded
   *       200:
   *         description: Existing syllabus updated
   */
  router.get('/syllabi', authorizeAction('list', 'syllabus'), validate(catalogListSchema), controller.listSyllabi);
  router.post('/syllabi', authorizeAction('create', 'syllabus'), validate(upsertSyllabusSchema), controller.upsertSyllabus);

  /**
   * @swagger
   * /syllabus/syllabi/{id}:
   *   parameters:
   *     - in: path
   *       name: id
   *       required: true
   *       schema:
   *         type: string
   *   get:
   *     tags: [Catalog]
   *     summary: Get a syllabus
   *     responses:
   *       200:
   *         description: Syllabus retrieved successfully
   *   put:
   *     tags: [Catalog]
   *     summary: Replace the syllabus URL
   *     responses:
   *       200:
   *         description: Syllabus updated successfully
   *   patch:
   *     tags: [Catalog]
   *     summary: Same as PUT
   *     responses:
   *       200:
   *         description: Syllabus updated successfully
   *   delete:
   *     tags: [Catalog]
   *     summary: Delete a syllabus
   *     responses:
   *       200:
   *         description: Syllabus deleted successfully
   */
  router.get('/syllabi/:id', authorizeAction('read', 'syllabus'), validate(idSchema), controller.getSyllabus);
  router.put('/syllabi/:id', authorizeAction('update', 'syllabus'), validate(updateSyllabusSchema), controller.updateSyllabus);
  router.patch('/syllabi/:id', authorizeAction('update', 'syllabus'), validate(updateSyllabusSchema), controller.updateSyllabus);
  router.delete('/syllabi/:id', authorizeAction('delete', 'syllabus'), validate(idSchema), controller.deleteSyllabus);

  /**
   * @swagger
   * /syllabus/departments/{department}/subjects:
   *   get:
   *     tags: [Catalog]
   *     summary: Subjects of one department, optionally one semester
   *     parameters:
   *       - in: path
   *         name: department
   *         required: true
   *         schema:
   *           type: string
   *       - in: query
   *         name: semester
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: "`{ count, items }`"
   *       400:
   *         description: Unknown department or semester outside 1-8
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Error'
   */
  router.get(
    '/departments/:department/subjects',
    authorizeAction('list', 'subject'),
    validate(departmentSubjectsSchema),
    controller.departmentSubjects
  );

  return router;
};
