import { Request, Response } from 'express';
import { currentUser } from '../middleware/auth.middleware';
import { Services } from '../services';
import { ApiResponse } from '../utils/ApiResponse';
import { asyncHandler } from '../utils/asyncHandler';
import { CreateNoticeBody, UpdateNoticeBody } from '../validators/notice.validator';

export const createNoticeController = ({ notices }: Pick<Services, 'notices'>) => ({
  list: asyncHandler(async (req: Request, res: Response) => {
    res.json(ApiResponse.success('Notices retrieved successfully', await notices.list(currentUser(req))));
  }),

  get: asyncHandler(async (req: Request, res: Response) => {
    const notice = await notices.get(currentUser(req), req.params.id);
    res.json(ApiResponse.success('Notice retrieved successfully', notice));
  }),

  create: asyncHandler(async (req: Request, res: Response) => {
    const body: CreateNoticeBody = req.body;
    const notice = await notices.create(currentUser(req), body);
    res.status(201).json(ApiResponse.success('Notice created successfully', notice));
  }),

  update: asyncHandler(async (req: Request, res: Response) => {
    const body: UpdateNoticeBody = req.body;
    res.json(ApiResponse.success('Notice updated successfully', await notices.update(req.params.id, body)));
  }),

  remove: asyncHandler(async (req: Request, res: Response) => {
    await notices.delete(req.params.id);
    res.json(ApiResponse.success('Notice deleted successfully', null));
  }),
});
