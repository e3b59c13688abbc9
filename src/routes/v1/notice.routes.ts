import { Router } from 'express';
import { createNoticeController } from '../../controllers/notice.controller';
import { authorizeAction } from '../../middleware/role.middleware';
import { validate } from '../../middleware/validate.middleware';
import { createNoticeSchema, noticeIdSchema, updateNoticeSchema } from '../../validators/notice.validator';
import { RouteDeps } from './deps';

export const createNoticeRouter = ({ services, authenticate }: RouteDeps): Router => {
  const router = Router();
  const controller = createNoticeController(services);

  router.use(authenticate);

  /**
   * @swagger
   * /notices:
   *   get:
   *     tags: [Notices]
   *     summary: Notices visible to the caller, newest first
   *     description: Students only see notices addressed to everyone.
   *     responses:
   *       200:
   *         description: "`{ count, items }`"
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/List'
   *   post:
   *     tags: [Notices]
   *     summary: Post a notice; the audience follows the category unless given
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [category]
   *             properties:
   *               category:
   *                 type: string
   *               audience:
   *                 type: string
   *                 enum: [staff, all]
   *               title:
   *                 type: string
   *               content:
   *                 type: string
   *               priority:
   *                 type: string
   *                 enum: [normal, important, urgent]
   *               expiryDate:
   *                 type: string
   *                 format: date-time
   *     responses:
   *       201:
   *         description: Notice created successfully
   */
  router.get('/', authorizeAction('list', 'notice'), controller.list);
  router.post('/', authorizeAction('create', 'notice'), validate(createNoticeSchema), controller.create);

  /**
   * @swagger
   * /notices/{id}:
   *   parameters:
   *     - in: path
   *       name: id
   *       required: true
   *       schema:
   *         type: string
   *   get:
   *     tags: [Notices]
   *     summary: Get a notice
   *     responses:
   *       200:
   *         description: Notice retrieved successfully
   *       403:
   *         description: Notice is not addressed to students
   *   put:
   *     tags: [Notices]
   *     summary: Update a notice
   *     responses:
   *       200:
   *         description: Notice updated successfully
   *   patch:
   *     tags: [Notices]
   *     summary: Same as PUT
   *     responses:
   *       200:
   *         description: Notice updated successfully
   *   delete:
   *     tags: [Notices]
   *     summary: Delete a notice
   *     responses:
   *       200:
   *         description: Notice deleted successfully
   */
  router.get('/:id', authorizeAction('read', 'notice'), validate(noticeIdSchema), controller.get);
  router.put('/:id', authorizeAction('update', 'notice'), validate(updateNoticeSchema), controller.update);
  router.patch('/:id', authorizeAction('update', 'notice'), validate(updateNoticeSchema), controller.update);
  router.delete('/:id', authorizeAction('delete', 'notice'), validate(noticeIdSchema), controller.remove);

  return router;
};
