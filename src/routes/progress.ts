import { Router } from 'express';
import { authenticate, requireUserId } from '../middleware/authMiddleware';
import { RouteDeps } from './deps';

export function createProgressRouter({ engines }: RouteDeps): Router {
    const router = Router();
    router.use(authenticate);

    // GET /progress
    router.get('/', async (req, res, next) => {
        try {
            const engine = await engines.forUser(requireUserId(req));
            res.json({ success: true, progress: engine.summary() });
        } catch (err) {
            next(err);
        }
    });

    // POST /progress/reset
    router.post('/reset', async (req, res, next) => {
        try {
            const engine = await engines.forUser(requireUserId(req));
            engine.resetProgress();
            res.json({ success: true, progress: engine.summary() });
        } catch (err) {
            next(err);
        }
    });

    return router;
}
