import { AchievementEngine } from './achievements';
import { Site } from './content';
import { Coordinates, isWithinRadius } from './geo';
import { LocationVerificationPort } from './location';
import { ProgressState, ProgressStore, withAdded, withEntry, withRemoved } from './progressStore';

export const VISIT_POLICY = {
    verificationRadiusMeters: 200,
    revisitCooldownDays: 30,
} as const;

export const POINTS = {
    verifiedVisit: 50,
    selfReportedVisit: 30,
    upgradeToVerified: 20,
    knowledgeKey: 1,
    placeDiscovery: 1,
    correctQuiz: 10,
} as const;

const DAY_MS = 24 * 60 * 60 * 1000;
const COOLDOWN_MS = VISIT_POLICY.revisitCooldownDays * DAY_MS;

export type VisitResult =
    | { status: 'verified'; pointsAwarded: number; distanceMeters: number }
    | { status: 'upgraded'; pointsAwarded: number; distanceMeters: number }
    | { status: 'self_reported'; pointsAwarded: number }
    | { status: 'already_self_reported'; pointsAwarded: 0 }
    | { status: 'blocked'; pointsAwarded: 0; daysRemaining: number }
    | { status: 'no_location'; pointsAwarded: 0 }
    | { status: 'too_far'; pointsAwarded: 0; distanceKm: number };

/**
 * Awards knowledge keys, discovery keys and content points. Each mutation is a
 * single store commit (badge and points together) followed by achievement
 * re-evaluation before the call returns.
 */
export class BadgeEngine {
    constructor(
        private readonly store: ProgressStore,
        private readonly achievements: AchievementEngine,
        private readonly now: () => number = Date.now
    ) {}

    // ─── Knowledge keys ────────────────────────────────────────────────────

    awardScholarBadge(subLocationId: string): boolean {
        if (this.store.snapshot().scholarBadges.has(subLocationId)) return false;

        this.store.update(current => ({
            ...current,
            scholarBadges: withAdded(current.scholarBadges, subLocationId),
            totalPoints: current.totalPoints + POINTS.knowledgeKey,
        }));
        this.achievements.evaluate();
        return true;
    }

    // ─── Discovery keys ────────────────────────────────────────────────────

    verifyVisit(site: Site, position: Coordinates | null): VisitResult {
        const state = this.store.snapshot();

        const blocked = this.cooldownBlock(site.id, state);
        if (blocked) return blocked;

        if (!position) return { status: 'no_location', pointsAwarded: 0 };

        const { withinRange, distance } = isWithinRadius(position, site.coordinates, VISIT_POLICY.verificationRadiusMeters);
        if (!withinRange) {
            return { status: 'too_far', pointsAwarded: 0, distanceKm: Math.round(distance / 10) / 100 };
        }

        const visitedAt = this.now();

        if (state.selfReportedSites.has(site.id)) {
            this.store.update(current => ({
                ...current,
                explorerBadges: withAdded(current.explorerBadges, site.id),
                selfReportedSites: withRemoved(current.selfReportedSites, site.id),
                verifiedVisits: withEntry(current.verifiedVisits, site.id, visitedAt),
                totalPoints: current.totalPoints + POINTS.upgradeToVerified,
            }));
            this.achievements.evaluate();
            return { status: 'upgraded', pointsAwarded: POINTS.upgradeToVerified, distanceMeters: Math.round(distance) };
        }

        this.store.update(current => ({
            ...current,
            explorerBadges: withAdded(current.explorerBadges, site.id),
            verifiedVisits: withEntry(current.verifiedVisits, site.id, visitedAt),
            totalPoints: current.totalPoints + POINTS.verifiedVisit,
        }));
        this.achievements.evaluate();
        return { status: 'verified', pointsAwarded: POINTS.verifiedVisit, distanceMeters: Math.round(distance) };
    }

    /**
     * Asks the port for a position, then verifies. A site still in cooldown is
     * rejected before the device is asked.
     */
    async locateAndVerify(
        site: Site,
        port: LocationVerificationPort,
        timeoutMs: number,
        signal?: AbortSignal
    ): Promise<VisitResult> {
        const blocked = this.cooldownBlock(site.id, this.store.snapshot());
        if (blocked) return blocked;

        const position = await port.requestPosition(timeoutMs, signal);
        return this.verifyVisit(site, position);
    }

    selfReportVisit(site: Site): VisitResult {
        const state = this.store.snapshot();

        if (state.explorerBadges.has(site.id) && state.selfReportedSites.has(site.id)) {
            return { status: 'already_self_reported', pointsAwarded: 0 };
        }

        const blocked = this.cooldownBlock(site.id, state);
        if (blocked) return blocked;

        const visitedAt = this.now();
        this.store.update(current => ({
            ...current,
            explorerBadges: withAdded(current.explorerBadges, site.id),
            selfReportedSites: withAdded(current.selfReportedSites, site.id),
            verifiedVisits: withEntry(current.verifiedVisits, site.id, visitedAt),
            totalPoints: current.totalPoints + POINTS.selfReportedVisit,
        }));
        this.achievements.evaluate();
        return { status: 'self_reported', pointsAwarded: POINTS.selfReportedVisit };
    }

    // ─── Content points ────────────────────────────────────────────────────

    discoverPlace(placeId: string): boolean {
        const discoveredAt = this.now();
        const last = this.store.snapshot().discoveredPlaces.get(placeId);
        if (last !== undefined && discoveredAt - last < COOLDOWN_MS) return false;

        this.store.update(current => ({
            ...current,
            discoveredPlaces: withEntry(current.discoveredPlaces, placeId, discoveredAt),
            totalPoints: current.totalPoints + POINTS.placeDiscovery,
        }));
        this.achievements.evaluate();
        return true;
    }

    recordCorrectQuiz(quizId: string): boolean {
        if (this.store.snapshot().completedQuizzes.has(quizId)) return false;

        this.store.update(current => ({
            ...current,
            completedQuizzes: withAdded(current.completedQuizzes, quizId),
            totalPoints: current.totalPoints + POINTS.correctQuiz,
        }));
        this.achievements.evaluate();
        return true;
    }

    /** Returns whether the site is a favorite afterwards. */
    toggleFavorite(siteId: string): boolean {
        const state = this.store.update(current => ({
            ...current,
            favoriteSites: current.favoriteSites.has(siteId)
                ? withRemoved(current.favoriteSites, siteId)
                : withAdded(current.favoriteSites, siteId),
        }));
        return state.favoriteSites.has(siteId);
    }

    // ─── Reads ─────────────────────────────────────────────────────────────

    hasScholarBadge(subLocationId: string): boolean {
        return this.store.snapshot().scholarBadges.has(subLocationId);
    }

    hasExplorerBadge(siteId: string): boolean {
        return this.store.snapshot().explorerBadges.has(siteId);
    }

    isSelfReported(siteId: string): boolean {
        return this.store.snapshot().selfReportedSites.has(siteId);
    }

    isSubLocationCompleted(subLocationId: string): boolean {
        return this.hasScholarBadge(subLocationId);
    }

    /** Days until a fully verified site can earn visit points again; null when it can now. */
    cooldownRemainingDays(siteId: string): number | null {
        const blocked = this.cooldownBlock(siteId, this.store.snapshot());
        return blocked ? blocked.daysRemaining : null;
    }

    private cooldownBlock(siteId: string, state: ProgressState): Extract<VisitResult, { status: 'blocked' }> | null {
        const fullyVerified = state.explorerBadges.has(siteId) && !state.selfReportedSites.has(siteId);
        if (!fullyVerified) return null;

        const lastVisit = state.verifiedVisits.get(siteId);
        if (lastVisit === undefined) return null;

        const remaining = lastVisit + COOLDOWN_MS - this.now();
        if (remaining <= 0) return null;

        return { status: 'blocked', pointsAwarded: 0, daysRemaining: Math.max(1, Math.ceil(remaining / DAY_MS)) };
    }
}
