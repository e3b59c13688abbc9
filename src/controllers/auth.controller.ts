import { Request, Response } from 'express';
import { currentUser } from '../middleware/auth.middleware';
import { Services } from '../services';
import { RegisterInput } from '../services/user.service';
import { ApiResponse } from '../utils/ApiResponse';
import { asyncHandler } from '../utils/asyncHandler';

export const createAuthController = ({ auth, users }: Pick<Services, 'auth' | 'users'>) => ({
  register: asyncHandler(async (req: Request, res: Response) => {
    const input: RegisterInput = req.body;
    const user = await users.register(input);
    res.status(201).json(
      ApiResponse.success('Registration successful', { user, tokens: auth.issueTokenPair(user) })
    );
  }),

  login: asyncHandler(async (req: Request, res: Response) => {
    const { email, password }: { email: string; password: string } = req.body;
    const user = await auth.verifyCredentials(email, password);
    res.json(ApiResponse.success('Login successful', { user, tokens: auth.issueTokenPair(user) }));
  }),

  refresh: asyncHandler(async (req: Request, res: Response) => {
    const { refresh }: { refresh: string } = req.body;
    res.json(ApiResponse.success('Token refreshed successfully', await auth.refresh(refresh)));
  }),

  profile: asyncHandler(async (req: Request, res: Response) => {
    const profile = await users.profile(currentUser(req).userId);
    res.json(ApiResponse.success('Profile retrieved successfully', profile));
  }),
});
