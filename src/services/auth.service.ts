import bcrypt from 'bcrypt';
import {
  generateAccessToken,
  generateRefreshToken,
  TokenPayload,
  verifyAccessToken,
  verifyRefreshToken,
} from '../config/jwt';
import { DataStore } from '../repositories/types';
import { AuthUser, TokenPair, UserRecord } from '../types';
import { ApiError } from '../utils/ApiError';

const payloadFor = (user: UserRecord): TokenPayload => ({
  userId: user.id,
  email: user.email,
  role: user.role,
});

/** Password hashing, credential checks and JWT issuance over the user store. */
export class AuthService {
  constructor(
    private readonly store: DataStore,
    private readonly saltRounds: number
  ) {}

  hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, this.saltRounds);
  }

  async verifyCredentials(email: string, password: string): Promise<UserRecord> {
    const found = await this.store.users.findCredentials(email.trim().toLowerCase());
    if (!found || !(await bcrypt.compare(password, found.passwordHash))) {
      throw ApiError.unauthorized('Invalid email or password.');
    }
    if (!found.user.isActive) {
      throw ApiError.forbidden('User account is disabled.');
    }
    return found.user;
  }

  issueTokenPair(user: UserRecord): TokenPair {
    const payload = payloadFor(user);
    return {
      access: generateAccessToken(payload),
      refresh: generateRefreshToken(payload),
    };
  }

  async refresh(refreshToken: string): Promise<{ access: string }> {
    const { userId } = verifyRefreshToken(refreshToken);
    const user = await this.activeUser(userId);
    return { access: generateAccessToken(payloadFor(user)) };
  }

  /** The stored user behind an access token; the token's own claims are not trusted for role. */
  async resolveActor(accessToken: string): Promise<AuthUser> {
    const { userId } = verifyAccessToken(accessToken);
    const user = await this.activeUser(userId);
    return {
      userId: user.id,
      email: user.email,
      role: user.role,
      isStaff: user.isStaff,
    };
  }

  private async activeUser(userId: string): Promise<UserRecord> {
    const user = await this.store.users.findById(userId);
    if (!user) {
      throw ApiError.unauthorized('User not found.');
    }
    if (!user.isActive) {
      throw ApiError.unauthorized('User account is disabled.');
    }
    return user;
  }
}
