import { Router } from 'express';
import { z } from 'zod';
import { isSiteFullyCompleted } from '../lib/achievements';
import { VisitResult } from '../lib/badges';
import { Site } from '../lib/content';
import { ProgressEngine } from '../lib/engine';
import { Coordinates } from '../lib/geo';
import { MIN_ACCURACY_METERS } from '../lib/location';
import { authenticate, requireUserId } from '../middleware/authMiddleware';
import { RouteDeps } from './deps';

const verifySchema = z
    .object({
        latitude: z.number().min(-90).max(90).optional(),
        longitude: z.number().min(-180).max(180).optional(),
        accuracy: z.number().nonnegative().optional(),
    })
    .refine(body => (body.latitude === undefined) === (body.longitude === undefined), {
        message: 'latitude and longitude must be sent together',
    });

function describeSite(site: Site, engine: ProgressEngine) {
    const state = engine.store.snapshot();
    return {
        ...site,
        hasExplorerBadge: state.explorerBadges.has(site.id),
        selfReported: state.selfReportedSites.has(site.id),
        fullyCompleted: isSiteFullyCompleted(site, state),
        favorite: state.favoriteSites.has(site.id),
        cooldownDaysRemaining: engine.badges.cooldownRemainingDays(site.id),
        subLocations: site.subLocations.map(sub => ({
            ...sub,
            hasScholarBadge: state.scholarBadges.has(sub.id),
        })),
    };
}

export function createSitesRouter({ engines, catalog, locationTimeoutMs }: RouteDeps): Router {
    const router = Router();
    router.use(authenticate);

    // GET /sites
    router.get('/', async (req, res, next) => {
        try {
            const engine = await engines.forUser(requireUserId(req));
            const sites = catalog.sites().map(site => describeSite(site, engine));
            res.json({ success: true, count: sites.length, sites });
        } catch (err) {
            next(err);
        }
    });

    // GET /sites/:siteId
    router.get('/:siteId', async (req, res, next) => {
        try {
            const site = catalog.site(req.params.siteId);
            if (!site) {
                res.status(404).json({ error: 'Site not found' });
                return;
            }

            const engine = await engines.forUser(requireUserId(req));
            res.json({ success: true, site: describeSite(site, engine) });
        } catch (err) {
            next(err);
        }
    });

    // POST /sites/:siteId/verify
    router.post('/:siteId/verify', async (req, res, next) => {
        try {
            const site = catalog.site(req.params.siteId);
            if (!site) {
                res.status(404).json({ error: 'Site not found' });
                return;
            }

            const body = verifySchema.parse(req.body ?? {});
            const engine = await engines.forUser(requireUserId(req));

            let result: VisitResult;
            if (body.latitude !== undefined && body.longitude !== undefined) {
                const position: Coordinates | null =
                    body.accuracy !== undefined && body.accuracy > MIN_ACCURACY_METERS
                        ? null
                        : { latitude: body.latitude, longitude: body.longitude };
                result = engine.badges.verifyVisit(site, position);
            } else {
                // No coordinates in the body: ask the user's connected device
                result = await engine.badges.locateAndVerify(site, engine.location, locationTimeoutMs);
            }

            res.json({
                success: true,
                result,
                totalPoints: engine.store.snapshot().totalPoints,
                notification: engine.achievements.pendingNotification(),
            });
        } catch (err) {
            next(err);
        }
    });

    // POST /sites/:siteId/self-report
    router.post('/:siteId/self-report', async (req, res, next) => {
        try {
            const site = catalog.site(req.params.siteId);
            if (!site) {
                res.status(404).json({ error: 'Site not found' });
                return;
            }

            const engine = await engines.forUser(requireUserId(req));
            const result = engine.badges.selfReportVisit(site);

            res.json({
                success: true,
                result,
                totalPoints: engine.store.snapshot().totalPoints,
                notification: engine.achievements.pendingNotification(),
            });
        } catch (err) {
            next(err);
        }
    });

    // POST /sites/:siteId/favorite
    router.post('/:siteId/favorite', async (req, res, next) => {
        try {
            const site = catalog.site(req.params.siteId);
            if (!site) {
                res.status(404).json({ error: 'Site not found' });
                return;
            }

            const engine = await engines.forUser(requireUserId(req));
            res.json({ success: true, favorite: engine.badges.toggleFavorite(site.id) });
        } catch (err) {
            next(err);
        }
    });

    return router;
}
