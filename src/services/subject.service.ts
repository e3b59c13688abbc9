import logger from '../config/logger';
import { UniqueConstraintError } from '../repositories/errors';
import { DataStore, SubjectChanges, SubjectFilter } from '../repositories/types';
import { CatalogDepartment, ListResult, SubjectRecord, SyllabusRecord } from '../types';
import { ApiError } from '../utils/ApiError';
import { catalogDepartmentName } from '../utils/departments';
import { compareSubjectCodes, nextSubjectCode, subjectCodePrefix } from '../utils/subjectCode';

export interface SubjectInput {
  name: string;
  department: CatalogDepartment;
  semester: number;
  pdfUrl?: string;
}

export type SubjectUpdate = SubjectChanges & { pdfUrl?: string };

export interface SubjectView extends SubjectRecord {
  departmentName: string;
  pdfUrl: string | null;
}

const DUPLICATE_NAME = 'Subject with this name already exists for this department and semester.';

const bySemesterAndCode = (a: SubjectRecord, b: SubjectRecord): number =>
  a.department.localeCompare(b.department) || a.semester - b.semester || compareSubjectCodes(a.subjectCode, b.subjectCode);

const toView = (subject: SubjectRecord, syllabus: SyllabusRecord | null): SubjectView => ({
  ...subject,
  departmentName: catalogDepartmentName(subject.department),
  pdfUrl: syllabus ? syllabus.pdfUrl : null,
});

/** The subject catalog. Codes are assigned on creation and never recomputed. */
export class SubjectService {
  constructor(
    private readonly store: DataStore,
    private readonly maxCodeAttempts: number
  ) {}

  /**
   * Each attempt reads the issued codes and inserts in its own transaction; losing
   * a race for a code to another writer starts a fresh attempt.
   */
  async create(input: SubjectInput): Promise<SubjectView> {
    for (let attempt = 1; attempt <= this.maxCodeAttempts; attempt += 1) {
      try {
        const view = await this.store.transaction(async (tx) => {
          if (await tx.subjects.findByNameInPair(input.name, input.department, input.semester)) {
            throw ApiError.invalidField('name', DUPLICATE_NAME);
          }
          const codes = await tx.subjects.listCodes(subjectCodePrefix(input.department, input.semester));
          const subject = await tx.subjects.create({
            name: input.name,
            department: input.department,
            semester: input.semester,
            subjectCode: nextSubjectCode(input.department, input.semester, codes),
          });
          const syllabus = input.pdfUrl ? (await tx.syllabi.upsert(subject.id, input.pdfUrl)).record : null;
          return toView(subject, syllabus);
        });
        logger.info('Subject created', { subjectId: view.id, subjectCode: view.subjectCode });
        return view;
      } catch (error) {
        if (error instanceof UniqueConstraintError && error.entity === 'subject') {
          if (error.involves('subjectCode')) {
            logger.warn('Subject code taken concurrently, retrying', {
              department: input.department,
              semester: input.semester,
              attempt,
            });
            continue;
          }
          throw ApiError.invalidField('name', DUPLICATE_NAME);
        }
        throw error;
      }
    }
    throw ApiError.conflict('Could not assign a unique subject code; please try again.');
  }

  async get(id: string): Promise<SubjectView> {
    const subject = await this.store.subjects.findById(id);
    if (!subject) {
      throw ApiError.notFound('Subject not found.');
    }
    return toView(subject, await this.store.syllabi.findBySubject(subject.id));
  }

  async list(filter: SubjectFilter = {}): Promise<ListResult<SubjectView>> {
    const subjects = (await this.store.subjects.list(filter)).sort(bySemesterAndCode);
    const syllabi = await this.store.syllabi.findBySubjects(subjects.map((subject) => subject.id));
    const bySubject = new Map(syllabi.map((syllabus) => [syllabus.subjectId, syllabus]));
    const items = subjects.map((subject) => toView(subject, bySubject.get(subject.id) ?? null));
    return { count: items.length, items };
  }

  async update(id: string, changes: SubjectUpdate): Promise<SubjectView> {
    const { pdfUrl, ...fields } = changes;
    try {
      return await this.store.transaction(async (tx) => {
        const current = await tx.subjects.findById(id);
        if (!current) {
          throw ApiError.notFound('Subject not found.');
        }
        const name = fields.name ?? current.name;
        const department = fields.department ?? current.department;
        const semester = fields.semester ?? current.semester;
        const clash = await tx.subjects.findByNameInPair(name, department, semester);
        if (clash && clash.id !== id) {
          throw ApiError.invalidField('name', DUPLICATE_NAME);
        }

        const updated = await tx.subjects.update(id, fields);
        if (!updated) {
          throw ApiError.notFound('Subject not found.');
        }
        const syllabus = pdfUrl
          ? (await tx.syllabi.upsert(id, pdfUrl)).record
          : await tx.syllabi.findBySubject(id);
        return toView(updated, syllabus);
      });
    } catch (error) {
      if (error instanceof UniqueConstraintError && error.entity === 'subject') {
        throw ApiError.invalidField('name', DUPLICATE_NAME);
      }
      throw error;
    }
  }

  async delete(id: string): Promise<void> {
    await this.store.transaction(async (tx) => {
      if (!(await tx.subjects.findById(id))) {
        throw ApiError.notFound('Subject not found.');
      }
      await tx.syllabi.deleteBySubject(id);
      await tx.subjects.delete(id);
    });
    logger.info('Subject deleted', { subjectId: id });
  }
}
