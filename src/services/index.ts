import { Settings } from '../config/settings';
import { DataStore } from '../repositories/types';
import { NOTICE_CATEGORY_AUDIENCE } from '../utils/constants';
import { CategoryAudienceTable, createAudienceResolver } from '../utils/noticeAudience';
import { AuthService } from './auth.service';
import { HodService } from './hod.service';
import { NoticeService } from './notice.service';
import { SubjectService } from './subject.service';
import { SyllabusService } from './syllabus.service';
import { UserService } from './user.service';

export interface Services {
  auth: AuthService;
  users: UserService;
  hods: HodService;
  subjects: SubjectService;
  syllabi: SyllabusService;
  notices: NoticeService;
}

type ServiceSettings = Pick<Settings, 'saltRounds' | 'hodStaffDeletePolicy' | 'subjectCodeMaxAttempts'>;

export function createServices(
  store: DataStore,
  settings: ServiceSettings,
  audienceTable: CategoryAudienceTable = NOTICE_CATEGORY_AUDIENCE
): Services {
  const auth = new AuthService(store, settings.saltRounds);
  return {
    auth,
    users: new UserService(store, auth, { hodStaffDeletePolicy: settings.hodStaffDeletePolicy }),
    hods: new HodService(store),
    subjects: new SubjectService(store, settings.subjectCodeMaxAttempts),
    syllabi: new SyllabusService(store),
    notices: new NoticeService(store, createAudienceResolver(audienceTable)),
  };
}
