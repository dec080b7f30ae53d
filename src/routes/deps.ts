import { ContentCatalog } from '../lib/content';
import { ProgressEngines } from '../lib/engine';

export interface RouteDeps {
    engines: ProgressEngines;
    catalog: ContentCatalog;
    /** How long a verify request waits for the device to report a position */
    locationTimeoutMs: number;
}
