export type RankId = 'tourist' | 'traveler' | 'explorer' | 'historian' | 'archaeologist' | 'pharaoh';

export interface Rank {
    id: RankId;
    name: string;
    minPoints: number;
    /** Inclusive upper bound; null for the terminal tier. */
    maxPoints: number | null;
}

export const RANKS: readonly Rank[] = [
    { id: 'tourist', name: 'Tourist', minPoints: 0, maxPoints: 50 },
    { id: 'traveler', name: 'Traveler', minPoints: 51, maxPoints: 150 },
    { id: 'explorer', name: 'Explorer', minPoints: 151, maxPoints: 300 },
    { id: 'historian', name: 'Historian', minPoints: 301, maxPoints: 500 },
    { id: 'archaeologist', name: 'Archaeologist', minPoints: 501, maxPoints: 800 },
    { id: 'pharaoh', name: 'Pharaoh', minPoints: 801, maxPoints: null },
];

export function rankFor(points: number): Rank {
    let current = RANKS[0];
    for (const rank of RANKS) {
        if (points >= rank.minPoints) current = rank;
    }
    return current;
}

export function nextRank(current: Rank): Rank | null {
    const index = RANKS.findIndex(r => r.id === current.id);
    return RANKS[index + 1] ?? null;
}

export function pointsToNext(current: Rank, points: number): number | null {
    const next = nextRank(current);
    if (!next) return null;
    return Math.max(0, next.minPoints - points);
}

export function progressFraction(current: Rank, points: number): number {
    const next = nextRank(current);
    if (!next) return 1;

    const span = next.minPoints - current.minPoints;
    const fraction = (points - current.minPoints) / span;
    return Math.min(1, Math.max(0, fraction));
}
