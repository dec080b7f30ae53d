import { Router } from 'express';
import { authenticate, requireUserId } from '../middleware/authMiddleware';
import { RouteDeps } from './deps';

export function createAchievementsRouter({ engines }: RouteDeps): Router {
    const router = Router();
    router.use(authenticate);

    // GET /achievements
    router.get('/', async (req, res, next) => {
        try {
            const engine = await engines.forUser(requireUserId(req));
            res.json({
                success: true,
                unlocked: engine.achievements.unlocked(),
                locked: engine.achievements.locked(),
            });
        } catch (err) {
            next(err);
        }
    });

    // GET /achievements/next
    router.get('/next', async (req, res, next) => {
        try {
            const engine = await engines.forUser(requireUserId(req));
            res.json({ success: true, next: engine.achievements.nextAchievement() });
        } catch (err) {
            next(err);
        }
    });

    // GET /achievements/notification
    router.get('/notification', async (req, res, next) => {
        try {
            const engine = await engines.forUser(requireUserId(req));
            res.json({ success: true, notification: engine.achievements.pendingNotification() });
        } catch (err) {
            next(err);
        }
    });

    // POST /achievements/notification/:achievementId/ack
    router.post('/notification/:achievementId/ack', async (req, res, next) => {
        try {
            const engine = await engines.forUser(requireUserId(req));
            const acknowledged = engine.achievements.acknowledgeNotification(req.params.achievementId);
            if (!acknowledged) {
                res.status(404).json({ error: 'No pending notification for this achievement' });
                return;
            }
            res.json({ success: true, notification: engine.achievements.pendingNotification() });
        } catch (err) {
            next(err);
        }
    });

    return router;
}
