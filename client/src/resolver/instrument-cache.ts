import type { Instrument } from "@brokerstream/shared";
import { createLogger, errorMessage } from "../utils/logger.js";
import {
  buildInstrumentIndex,
  normalizeCode,
  type InstrumentDirectory,
  type InstrumentIndex,
} from "./instrument-directory.js";

/**
 * Lazily downloaded, per-segment instrument indexes. Concurrent first loads of
 * a segment share one request; failed downloads are not cached.
 */
export class InstrumentCache {
  private log = createLogger("instrument-cache");
  private directory: InstrumentDirectory;
  private indexes = new Map<string, InstrumentIndex>();
  private loading = new Map<string, Promise<InstrumentIndex>>();

  constructor(directory: InstrumentDirectory) {
    this.directory = directory;
  }

  isLoaded(segment: string): boolean {
    return this.indexes.has(normalizeCode(segment));
  }

  load(segment: string): Promise<InstrumentIndex> {
    const key = normalizeCode(segment);
    const cached = this.indexes.get(key);
    if (cached) return Promise.resolve(cached);

    const inFlight = this.loading.get(key);
    if (inFlight) return inFlight;

    const load = this.directory
      .bySegment(key)
      .then((records) => {
        const index = buildInstrumentIndex(records);
        this.indexes.set(key, index);
        this.log.debug("Indexed instruments", { segment: key, records: records.length, keys: index.size });
        return index;
      })
      .catch((err: unknown) => {
        this.log.error("Failed to download instruments", { segment: key, error: errorMessage(err) });
        return new Map<string, Instrument>();
      })
      .finally(() => {
        this.loading.delete(key);
      });

    this.loading.set(key, load);
    return load;
  }

  clear(): void {
    this.indexes.clear();
  }
}
