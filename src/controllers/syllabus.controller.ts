import { Request, Response } from 'express';
import { Services } from '../services';
import { ApiResponse } from '../utils/ApiResponse';
import { asyncHandler } from '../utils/asyncHandler';
import {
  catalogListQuery,
  CreateSubjectBody,
  departmentSubjectsQuery,
  UpdateSubjectBody,
  UpsertSyllabusBody,
} from '../validators/catalog.validator';
import { catalogDepartment } from '../validators/common';

export const createSyllabusController = ({ subjects, syllabi }: Pick<Services, 'subjects' | 'syllabi'>) => ({
  listSubjects: asyncHandler(async (req: Request, res: Response) => {
    const filter = catalogListQuery.parse(req.query);
    res.json(ApiResponse.success('Subjects retrieved successfully', await subjects.list(filter)));
  }),

  createSubject: asyncHandler(async (req: Request, res: Response) => {
    const body: CreateSubjectBody = req.body;
    res.status(201).json(ApiResponse.success('Subject created successfully', await subjects.create(body)));
  }),

  getSubject: asyncHandler(async (req: Request, res: Response) => {
    res.json(ApiResponse.success('Subject retrieved successfully', await subjects.get(req.params.id)));
  }),

  updateSubject: asyncHandler(async (req: Request, res: Response) => {
    const body: UpdateSubjectBody = req.body;
    res.json(ApiResponse.success('Subject updated successfully', await subjects.update(req.params.id, body)));
  }),

  deleteSubject: asyncHandler(async (req: Request, res: Response) => {
    await subjects.delete(req.params.id);
    res.json(ApiResponse.success('Subject deleted successfully', null));
  }),

  departmentSubjects: asyncHandler(async (req: Request, res: Response) => {
    const department = catalogDepartment.parse(req.params.department);
    const { semester } = departmentSubjectsQuery.parse(req.query);
    res.json(ApiResponse.success('Subjects retrieved successfully', await subjects.list({ department, semester })));
  }),

  listSyllabi: asyncHandler(async (req: Request, res: Response) => {
    const filter = catalogListQuery.parse(req.query);
    res.json(ApiResponse.success('Syllabi retrieved successfully', await syllabi.list(filter)));
  }),

  upsertSyllabus: asyncHandler(async (req: Request, res: Response) => {
    const { subject, pdfUrl }: UpsertSyllabusBody = req.body;
    const { syllabus, created } = await syllabi.upsert(subject, pdfUrl);
    res
      .status(created ? 201 : 200)
      .json(ApiResponse.success(created ? 'Syllabus uploaded successfully' : 'Syllabus updated successfully', syllabus));
  }),

  getSyllabus: asyncHandler(async (req: Request, res: Response) => {
    res.json(ApiResponse.success('Syllabus retrieved successfully', await syllabi.get(req.params.id)));
  }),

  updateSyllabus: asyncHandler(async (req: Request, res: Response) => {
    const { pdfUrl }: { pdfUrl: string } = req.body;
    res.json(ApiResponse.success('Syllabus updated successfully', await syllabi.update(req.params.id, pdfUrl)));
  }),

  deleteSyllabus: asyncHandler(async (req: Request, res: Response) => {
    await syllabi.delete(req.params.id);
    res.json(ApiResponse.success('Syllabus deleted successfully', null));
  }),
});
