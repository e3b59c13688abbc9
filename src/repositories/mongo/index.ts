import mongoose, { ClientSession } from 'mongoose';
import {
  DataStore,
  HodRepository,
  NoticeRepository,
  StaffRepository,
  StudentRepository,
  SubjectRepository,
  SyllabusRepository,
  UserRepository,
} from '../types';
import { MongoHodRepository } from './hod.repository';
import { MongoNoticeRepository } from './notice.repository';
import { MongoStaffRepository } from './staff.repository';
import { MongoStudentRepository } from './student.repository';
import { MongoSubjectRepository } from './subject.repository';
import { MongoSyllabusRepository } from './syllabus.repository';
import { MongoUserRepository } from './user.repository';

/**
 * DataStore over the shared mongoose connection. Without a session every call is
 * its own write; `transaction` hands `work` a store bound to one session.
 */
export class MongoDataStore implements DataStore {
  readonly users: UserRepository;
  readonly students: StudentRepository;
  readonly staff: StaffRepository;
  readonly hods: HodRepository;
  readonly subjects: SubjectRepository;
  readonly syllabi: SyllabusRepository;
  readonly notices: NoticeRepository;

  constructor(private readonly session?: ClientSession) {
    this.users = new MongoUserRepository(session);
    this.students = new MongoStudentRepository(session);
    this.staff = new MongoStaffRepository(session);
    this.hods = new MongoHodRepository(session);
    this.subjects = new MongoSubjectRepository(session);
    this.syllabi = new MongoSyllabusRepository(session);
    this.notices = new MongoNoticeRepository(session);
  }

  transaction<T>(work: (tx: DataStore) => Promise<T>): Promise<T> {
    if (this.session) {
      return work(this);
    }
    return mongoose.connection.transaction((session) => work(new MongoDataStore(session)));
  }
}
