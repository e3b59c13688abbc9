import logger from '../config/logger';
import { UniqueConstraintError } from '../repositories/errors';
import { DataStore, SubjectFilter } from '../repositories/types';
import { CatalogDepartment, ListResult, SubjectRecord, SyllabusRecord } from '../types';
import { ApiError } from '../utils/ApiError';

export interface SyllabusView extends SyllabusRecord {
  subjectName: string;
  subjectCode: string;
  department: CatalogDepartment;
  semester: number;
}

const toView = (syllabus: SyllabusRecord, subject: SubjectRecord): SyllabusView => ({
  ...syllabus,
  subjectName: subject.name,
  subjectCode: subject.subjectCode,
  department: subject.department,
  semester: subject.semester,
});

/** One syllabus document per subject. */
export class SyllabusService {
  constructor(private readonly store: DataStore) {}

  /** Creates the subject's syllabus or replaces its URL; `created` tells which. */
  async upsert(subjectId: string, pdfUrl: string): Promise<{ syllabus: SyllabusView; created: boolean }> {
    try {
      const result = await this.store.transaction(async (tx) => {
        const subject = await tx.subjects.findById(subjectId);
        if (!subject) {
          throw ApiError.invalidField('subject', 'Subject not found.');
        }
        const { record, created } = await tx.syllabi.upsert(subject.id, pdfUrl);
        return { syllabus: toView(record, subject), created };
      });
      logger.info(result.created ? 'Syllabus uploaded' : 'Syllabus replaced', {
        syllabusId: result.syllabus.id,
        subjectCode: result.syllabus.subjectCode,
      });
      return result;
    } catch (error) {
      if (error instanceof UniqueConstraintError && error.entity === 'syllabus') {
        throw ApiError.conflict('A syllabus for this subject was uploaded concurrently; please retry.');
      }
      throw error;
    }
  }

  async get(id: string): Promise<SyllabusView> {
    const syllabus = await this.store.syllabi.findById(id);
    if (!syllabus) {
      throw ApiError.notFound('Syllabus not found.');
    }
    return toView(syllabus, await this.subjectOf(syllabus));
  }

  async list(filter: SubjectFilter = {}): Promise<ListResult<SyllabusView>> {
    const subjects = await this.store.subjects.list(filter);
    const subjectById = new Map(subjects.map((subject) => [subject.id, subject]));
    const syllabi = await this.store.syllabi.findBySubjects([...subjectById.keys()]);
    const items = syllabi
      .flatMap((syllabus) => {
        const subject = subjectById.get(syllabus.subjectId);
        return subject ? [toView(syllabus, subject)] : [];
      })
      .sort((a, b) => b.uploadedAt.getTime() - a.uploadedAt.getTime());
    return { count: items.length, items };
  }

  async update(id: string, pdfUrl: string): Promise<SyllabusView> {
    const syllabus = await this.store.syllabi.update(id, pdfUrl);
    if (!syllabus) {
      throw ApiError.notFound('Syllabus not found.');
    }
    return toView(syllabus, await this.subjectOf(syllabus));
  }

  async delete(id: string): Promise<void> {
    if (!(await this.store.syllabi.delete(id))) {
      throw ApiError.notFound('Syllabus not found.');
    }
    logger.info('Syllabus deleted', { syllabusId: id });
  }

  private async subjectOf(syllabus: SyllabusRecord): Promise<SubjectRecord> {
    const subject = await this.store.subjects.findById(syllabus.subjectId);
    if (!subject) {
      throw ApiError.notFound('Subject not found.');
    }
    return subject;
  }
}
