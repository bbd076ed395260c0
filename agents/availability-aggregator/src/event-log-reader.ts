/**
 * Availability Aggregator Agent - Event Log Reader
 *
 * Discovers tracked entities under each configured source prefix and loads
 * their event logs from the object store.
 */

import type { EventLog } from '../contracts/schemas.js';
import { parseEventLog } from '../contracts/validation.js';
import type { EventLogSourceConfig } from './config.js';
import { AggregationError, errorMessage } from './errors.js';
import type { ObjectStore } from './store-client.js';

export interface EntityRef {
  /** `<source name>/<key without the source prefix>` */
  id: string;
  source: string;
  key: string;
}

export interface SourceFailure {
  source: string;
  error: AggregationError;
}

/**
 * Entities from every source that could be listed, plus the sources that
 * could not.
 */
export interface EntityListing {
  entities: EntityRef[];
  failures: SourceFailure[];
}

export interface EventLogSource {
  listEntities(signal?: AbortSignal): Promise<EntityListing>;
  readLog(entity: EntityRef, signal?: AbortSignal): Promise<EventLog>;
}

export class EventLogReader implements EventLogSource {
  private readonly store: ObjectStore;
  private readonly sources: readonly EventLogSourceConfig[];

  constructor(store: ObjectStore, sources: readonly EventLogSourceConfig[]) {
    this.store = store;
    this.sources = sources;
  }

  /**
   * Every entity currently tracked across the sources that can be listed.
   * Throws SOURCE_UNAVAILABLE only when no source can be listed.
   */
  async listEntities(signal?: AbortSignal): Promise<EntityListing> {
    const entities: EntityRef[] = [];
    const failures: SourceFailure[] = [];

    for (const source of this.sources) {
      signal?.throwIfAborted();

      let keys: string[];
      try {
        keys = await this.store.list(source.prefix, signal);
      } catch (error) {
        if (signal?.aborted) throw error;
        failures.push({
          source: source.name,
          error: new AggregationError(
            'SOURCE_UNAVAILABLE',
            `Failed to list event logs for source ${source.name}: ${errorMessage(error)}`,
            { cause: error }
          ),
        });
        continue;
      }

      for (const key of [...keys].sort()) {
        const name = key.startsWith(source.prefix) ? key.slice(source.prefix.length) : key;
        if (name.length === 0) continue;
        entities.push({ id: `${source.name}/${name}`, source: source.name, key });
      }
    }

    if (this.sources.length > 0 && failures.length === this.sources.length) {
      throw new AggregationError(
        'SOURCE_UNAVAILABLE',
        `No event log source could be listed: ${failures.map((f) => f.error.message).join('; ')}`,
        { cause: failures[0]?.error }
      );
    }

    return { entities, failures };
  }

  async readLog(entity: EntityRef, signal?: AbortSignal): Promise<EventLog> {
    const raw = await this.store.get(entity.key, signal);
    if (raw === null) {
      throw new AggregationError(
        'EVENT_LOG_NOT_FOUND',
        `Event log ${entity.key} disappeared before it could be read`,
        { entity: entity.id }
      );
    }

    const result = parseEventLog(raw);
    if (!result.success) {
      const detail = result.errors.map((e) => (e.path ? `${e.path}: ${e.message}` : e.message)).join('; ');
      throw new AggregationError(result.code, `Event log ${entity.key} rejected: ${detail}`, {
        entity: entity.id,
      });
    }

    return result.data;
  }
}
