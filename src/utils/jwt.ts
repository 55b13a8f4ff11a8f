import * as jwt from 'jsonwebtoken';
import { z } from 'zod';
import { env } from '../config/env.config';

export interface JwtPayload {
  sub: string;
  email: string;
}

// Runtime validation of decoded tokens
const JwtPayloadSchema = z.object({
  sub: z.string(),
  email: z.string().email(),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

export function signToken(payload: JwtPayload, options: { expiresIn?: string } = {}): string {
  return jwt.sign(payload, env.JWT_SECRET, {
    algorithm: 'HS256',
    expiresIn: (options.expiresIn ?? env.JWT_EXPIRES_IN) as jwt.SignOptions['expiresIn'],
  });
}

export function verifyToken(token: string): JwtPayload {
  const decoded = jwt.verify(token, env.JWT_SECRET, {
    algorithms: ['HS256'],
  });

  const parsed = JwtPayloadSchema.parse(decoded);
  return {
    sub: parsed.sub,
    email: parsed.email.toLowerCase(),
  };
}
