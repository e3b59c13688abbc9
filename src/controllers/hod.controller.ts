import { Request, Response } from 'express';
import { Services } from '../services';
import { ApiResponse } from '../utils/ApiResponse';
import { asyncHandler } from '../utils/asyncHandler';
import { personDepartment } from '../validators/common';
import { AppointHodBody, hodListQuery, UpdateHodBody } from '../validators/hod.validator';

export const createHodController = ({ hods }: Pick<Services, 'hods'>) => ({
  list: asyncHandler(async (req: Request, res: Response) => {
    const filter = hodListQuery.parse(req.query);
    res.json(ApiResponse.success('HOD records retrieved successfully', await hods.list(filter)));
  }),

  appoint: asyncHandler(async (req: Request, res: Response) => {
    const { staff, supersede, ...input }: AppointHodBody = req.body;
    const hod = await hods.appoint({ staffId: staff, ...input }, { supersede });
    res.status(201).json(ApiResponse.success('HOD appointed successfully', hod));
  }),

  get: asyncHandler(async (req: Request, res: Response) => {
    res.json(ApiResponse.success('HOD record retrieved successfully', await hods.get(req.params.id)));
  }),

  update: asyncHandler(async (req: Request, res: Response) => {
    const changes: UpdateHodBody = req.body;
    res.json(ApiResponse.success('HOD record updated successfully', await hods.update(req.params.id, changes)));
  }),

  retire: asyncHandler(async (req: Request, res: Response) => {
    res.json(ApiResponse.success('HOD retired successfully', await hods.retire(req.params.id)));
  }),

  current: asyncHandler(async (req: Request, res: Response) => {
    const department = personDepartment.parse(req.params.department);
    res.json(ApiResponse.success('Current HOD retrieved successfully', await hods.currentHod(department)));
  }),
});
