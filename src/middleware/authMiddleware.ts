import { Request, Response, NextFunction } from 'express';
import { verifyToken, extractToken } from '../lib/auth';

export function authenticate(req: Request, res: Response, next: NextFunction) {
    const token = extractToken(req.headers.authorization || null);

    if (!token) {
        res.status(401).json({ error: 'Authentication required' });
        return;
    }

    const payload = verifyToken(token);

    if (!payload) {
        res.status(401).json({ error: 'Invalid or expired token' });
        return;
    }

    req.user = payload;
    next();
}

// Route handlers run after `authenticate`, so a missing user is a wiring bug
export function requireUserId(req: Request): string {
    if (!req.user) {
        throw new Error('authenticate middleware did not run');
    }
    return req.user.userId;
}
