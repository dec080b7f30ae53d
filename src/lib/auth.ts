import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { env } from '../config/env';

export interface JWTPayload {
    userId: string;
    role: 'guest';
}

const payloadSchema = z.object({
    userId: z.string().min(1),
    role: z.literal('guest'),
});

// Generate JWT token
export function generateToken(payload: JWTPayload): string {
    return jwt.sign(payload, env.JWT_SECRET, {
        expiresIn: env.JWT_EXPIRES_IN_SECONDS,
    });
}

// Verify JWT token
export function verifyToken(token: string): JWTPayload | null {
    try {
        const decoded = jwt.verify(token, env.JWT_SECRET);
        const parsed = payloadSchema.safeParse(decoded);
        return parsed.success ? parsed.data : null;
    } catch (error) {
        console.error('JWT verification error:', error);
        return null;
    }
}

// Extract token from Authorization header
export function extractToken(authHeader: string | null): string | null {
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
        return null;
    }
    return authHeader.substring(7);
}
