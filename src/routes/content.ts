import { Router } from 'express';
import { z } from 'zod';
import { authenticate, requireUserId } from '../middleware/authMiddleware';
import { RouteDeps } from './deps';

const idSchema = z.string().trim().min(1).max(200);

export function createContentRouter({ engines, catalog }: RouteDeps): Router {
    const router = Router();

    // Mounted at the root, so auth is per route and unknown paths still 404

    // POST /sub-locations/:subLocationId/complete
    router.post('/sub-locations/:subLocationId/complete', authenticate, async (req, res, next) => {
        try {
            const subLocationId = idSchema.parse(req.params.subLocationId);
            if (!catalog.siteForSubLocation(subLocationId)) {
                res.status(404).json({ error: 'Sub-location not found' });
                return;
            }

            const engine = await engines.forUser(requireUserId(req));
            const awarded = engine.badges.awardScholarBadge(subLocationId);

            res.json({
                success: true,
                awarded,
                totalPoints: engine.store.snapshot().totalPoints,
                notification: engine.achievements.pendingNotification(),
            });
        } catch (err) {
            next(err);
        }
    });

    // POST /places/:placeId/discover
    router.post('/places/:placeId/discover', authenticate, async (req, res, next) => {
        try {
            const placeId = idSchema.parse(req.params.placeId);
            const engine = await engines.forUser(requireUserId(req));
            const awarded = engine.badges.discoverPlace(placeId);

            res.json({ success: true, awarded, totalPoints: engine.store.snapshot().totalPoints });
        } catch (err) {
            next(err);
        }
    });

    // POST /quizzes/:quizId/correct
    router.post('/quizzes/:quizId/correct', authenticate, async (req, res, next) => {
        try {
            const quizId = idSchema.parse(req.params.quizId);
            const engine = await engines.forUser(requireUserId(req));
            const awarded = engine.badges.recordCorrectQuiz(quizId);

            res.json({
                success: true,
                awarded,
                totalPoints: engine.store.snapshot().totalPoints,
                notification: engine.achievements.pendingNotification(),
            });
        } catch (err) {
            next(err);
        }
    });

    return router;
}
