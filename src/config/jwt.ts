import jwt, { JwtPayload, SignOptions } from 'jsonwebtoken';
import { ApiError } from '../utils/ApiError';
import { ACCESS_TOKEN_EXPIRY, REFRESH_TOKEN_EXPIRY } from '../utils/constants';

export interface TokenPayload {
  userId: string;
  email: string;
  role: string;
}

type TokenKind = 'access' | 'refresh';

function secretFor(kind: TokenKind): string {
  const name = kind === 'access' ? 'JWT_ACCESS_SECRET' : 'JWT_REFRESH_SECRET';
  const value = process.env[name];
  if (value) return value;
  if (process.env.NODE_ENV === 'production') {
    throw new Error(`${name} is required in production`);
  }
  return `${kind}_secret_fallback`;
}

const expiryFor = (kind: TokenKind): string =>
  kind === 'access'
    ? process.env.JWT_ACCESS_EXPIRY || ACCESS_TOKEN_EXPIRY
    : process.env.JWT_REFRESH_EXPIRY || REFRESH_TOKEN_EXPIRY;

const signOpts = (kind: TokenKind): SignOptions => ({
  expiresIn: expiryFor(kind) as SignOptions['expiresIn'],
  subject: kind,
});

function toTokenPayload(decoded: string | JwtPayload, kind: TokenKind): TokenPayload {
  if (
    typeof decoded === 'string' ||
    decoded.sub !== kind ||
    typeof decoded.userId !== 'string' ||
    typeof decoded.email !== 'string' ||
    typeof decoded.role !== 'string'
  ) {
    throw ApiError.unauthorized(`Invalid or expired ${kind} token`);
  }
  return { userId: decoded.userId, email: decoded.email, role: decoded.role };
}

function verify(token: string, kind: TokenKind): TokenPayload {
  let decoded: string | JwtPayload;
  try {
    decoded = jwt.verify(token, secretFor(kind));
  } catch (error) {
    throw ApiError.unauthorized(`Invalid or expired ${kind} token`);
  }
  return toTokenPayload(decoded, kind);
}

export const generateAccessToken = (payload: TokenPayload): string => {
  return jwt.sign(payload, secretFor('access'), signOpts('access'));
};

export const generateRefreshToken = (payload: TokenPayload): string => {
  return jwt.sign(payload, secretFor('refresh'), signOpts('refresh'));
};

export const verifyAccessToken = (token: string): TokenPayload => verify(token, 'access');

export const verifyRefreshToken = (token: string): TokenPayload => verify(token, 'refresh');
