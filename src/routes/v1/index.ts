import { Router } from 'express';
import { createAuthRouter } from './auth.routes';
import { RouteDeps } from './deps';
import { createHodRouter } from './hod.routes';
import { createNoticeRouter } from './notice.routes';
import { createStaffRouter } from './staff.routes';
import { createStudentRouter } from './student.routes';
import { createSyllabusRouter } from './syllabus.routes';

export const createV1Router = (deps: RouteDeps): Router => {
  const router = Router();

  router.use('/auth', createAuthRouter(deps));
  router.use('/auth', createStudentRouter(deps));
  router.use('/auth', createStaffRouter(deps));
  router.use('/auth', createHodRouter(deps));
  router.use('/notices', createNoticeRouter(deps));
  router.use('/syllabus', createSyllabusRouter(deps));

  return router;
};
