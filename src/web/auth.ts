import crypto from 'crypto';
import { NextFunction, Request, Response } from 'express';
import jwt from 'jsonwebtoken';

export interface WebAuthOptions {
  password: string;
  secret: string;
  tokenTtlSeconds: number;
}

const TOKEN_SUBJECT = 'operator';

export function passwordMatches(expected: string, given: string): boolean {
  if (!expected) return false;
  const a = crypto.createHash('sha256').update(expected).digest();
  const b = crypto.createHash('sha256').update(given).digest();
  return crypto.timingSafeEqual(a, b);
}

export function issueToken(options: WebAuthOptions): string {
  return jwt.sign({ type: 'access' }, options.secret, {
    subject: TOKEN_SUBJECT,
    expiresIn: options.tokenTtlSeconds,
  });
}

/**
 * Requires `Authorization: Bearer <token>` carrying an access token
 * issued by {@link issueToken}.
 */
export function requireAuth(secret: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      return res.status(401).json({
        error: 'unauthorized',
        message: 'Missing authorization token',
      });
    }

    const token = authHeader.slice('Bearer '.length).trim();

    try {
      const decoded = jwt.verify(token, secret);
      if (typeof decoded === 'string' || decoded.type !== 'access' || decoded.sub !== TOKEN_SUBJECT) {
        return res.status(401).json({
          error: 'unauthorized',
          message: 'Invalid token type',
        });
      }
      next();
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        return res.status(401).json({
          error: 'unauthorized',
          message: 'Token has expired',
        });
      }
      return res.status(401).json({
        error: 'unauthorized',
        message: 'Invalid token',
      });
    }
  };
}
