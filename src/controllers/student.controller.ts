import { Request, Response } from 'express';
import { Services } from '../services';
import { ApiResponse } from '../utils/ApiResponse';
import { asyncHandler } from '../utils/asyncHandler';
import { AddStudentBody, UpdateStudentBody } from '../validators/user.validator';

export const createStudentController = ({ users }: Pick<Services, 'users'>) => ({
  add: asyncHandler(async (req: Request, res: Response) => {
    const body: AddStudentBody = req.body;
    const student = await users.addStudent(body);
    res.status(201).json(ApiResponse.success('Student added successfully', student));
  }),

  list: asyncHandler(async (_req: Request, res: Response) => {
    res.json(ApiResponse.success('Students retrieved successfully', await users.listStudents()));
  }),

  get: asyncHandler(async (req: Request, res: Response) => {
    res.json(ApiResponse.success('Student retrieved successfully', await users.getStudent(req.params.studentId)));
  }),

  update: asyncHandler(async (req: Request, res: Response) => {
    const body: UpdateStudentBody = req.body;
    const student = await users.updateStudent(req.params.studentId, body);
    res.json(ApiResponse.success('Student updated successfully', student));
  }),

  remove: asyncHandler(async (req: Request, res: Response) => {
    await users.deleteStudent(req.params.studentId);
    res.json(ApiResponse.success('Student deleted successfully', null));
  }),
});
