import { Request, Response } from 'express';
import { Services } from '../services';
import { ApiResponse } from '../utils/ApiResponse';
import { asyncHandler } from '../utils/asyncHandler';
import { AddStaffBody, UpdateStaffBody } from '../validators/user.validator';

export const createStaffController = ({ users }: Pick<Services, 'users'>) => ({
  add: asyncHandler(async (req: Request, res: Response) => {
    const body: AddStaffBody = req.body;
    const staff = await users.addStaff(body);
    res.status(201).json(ApiResponse.success('Staff added successfully', staff));
  }),

  list: asyncHandler(async (_req: Request, res: Response) => {
    res.json(ApiResponse.success('Staff retrieved successfully', await users.listStaff()));
  }),

  get: asyncHandler(async (req: Request, res: Response) => {
    res.json(ApiResponse.success('Staff retrieved successfully', await users.getStaff(req.params.staffId)));
  }),

  update: asyncHandler(async (req: Request, res: Response) => {
    const body: UpdateStaffBody = req.body;
    const staff = await users.updateStaff(req.params.staffId, body);
    res.json(ApiResponse.success('Staff updated successfully', staff));
  }),

  remove: asyncHandler(async (req: Request, res: Response) => {
    await users.deleteStaff(req.params.staffId);
    res.json(ApiResponse.success('Staff deleted successfully', null));
  }),
});
