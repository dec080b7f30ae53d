import { Router } from 'express';
import { z } from 'zod';
import { generateToken } from '../lib/auth';
import { deriveGuestUserId } from '../lib/guestAuth';

const guestSchema = z.object({
    fingerprint: z.string().trim().max(200).optional(),
});

export function createAuthRouter(): Router {
    const router = Router();

    // POST /auth/guest
    router.post('/guest', (req, res, next) => {
        try {
            const { fingerprint } = guestSchema.parse(req.body ?? {});
            const userId = deriveGuestUserId(fingerprint);
            const token = generateToken({ userId, role: 'guest' });

            res.status(201).json({ success: true, userId, token });
        } catch (err) {
            next(err);
        }
    });

    return router;
}
