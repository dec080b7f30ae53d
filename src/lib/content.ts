import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { Coordinates } from './geo';

export interface SubLocation {
    id: string;
    name: string;
}

export interface Site {
    id: string;
    name: string;
    city: string;
    era: string;
    coordinates: Coordinates;
    subLocations: SubLocation[];
}

const siteSchema = z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    city: z.string().min(1),
    era: z.string().min(1),
    coordinates: z.object({
        latitude: z.number().min(-90).max(90),
        longitude: z.number().min(-180).max(180),
    }),
    subLocations: z.array(z.object({ id: z.string().min(1), name: z.string().min(1) })).default([]),
});

const sitesFileSchema = z.object({ sites: z.array(siteSchema) });

export const DEFAULT_CONTENT_PATH = path.resolve(__dirname, '../../data/sites.json');

/**
 * Read-only site catalog. `version` changes whenever the site list is replaced,
 * so anything derived from the catalog can tell when to recompute.
 */
export class ContentCatalog {
    private siteList: Site[] = [];
    private byId = new Map<string, Site>();
    private bySubLocation = new Map<string, Site>();
    private versionCounter = 0;

    constructor(sites: Site[] = []) {
        this.replace(sites);
    }

    get version(): number {
        return this.versionCounter;
    }

    sites(): readonly Site[] {
        return this.siteList;
    }

    site(id: string): Site | undefined {
        return this.byId.get(id);
    }

    siteForSubLocation(subLocationId: string): Site | undefined {
        return this.bySubLocation.get(subLocationId);
    }

    replace(sites: Site[]): void {
        this.siteList = sites;
        this.byId = new Map(sites.map(s => [s.id, s]));
        this.bySubLocation = new Map(sites.flatMap(s => s.subLocations.map((sub): [string, Site] => [sub.id, s])));
        this.versionCounter++;
    }
}

export async function loadSitesFile(filePath: string = DEFAULT_CONTENT_PATH): Promise<Site[]> {
    const raw = await fs.readFile(filePath, 'utf8');
    return sitesFileSchema.parse(JSON.parse(raw)).sites;
}

export async function refreshCatalog(catalog: ContentCatalog, filePath?: string): Promise<void> {
    catalog.replace(await loadSitesFile(filePath));
}
