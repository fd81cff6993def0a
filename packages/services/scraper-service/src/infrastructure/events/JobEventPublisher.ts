/**
 * Job Event Publisher
 * In-process notification channel for job lifecycle events. Listener
 * errors are logged and never reach the publisher.
 */

import { EventEmitter } from 'events';
import { serializeError } from '@songharvest/platform-core';
import type { IJobEventPublisher, JobEventListener, JobEventMap, JobEventName } from '../../application/ports';
import { getLogger } from '../../config/logger';

const logger = getLogger('scraper-service:job-events');

export class JobEventPublisher implements IJobEventPublisher {
  private readonly emitter = new EventEmitter();

  constructor(maxListeners = 50) {
    this.emitter.setMaxListeners(maxListeners);
  }

  publish<K extends JobEventName>(event: K, payload: JobEventMap[K]): void {
    this.emitter.emit(event, payload);
  }

  subscribe<K extends JobEventName>(event: K, listener: JobEventListener<K>): () => void {
    const wrapped = (payload: JobEventMap[K]) => {
      try {
        const result = listener(payload);
        if (result instanceof Promise) {
          result.catch(error => {
            logger.warn('Job event listener failed', { event, error: serializeError(error) });
          });
        }
      } catch (error) {
        logger.warn('Job event listener failed', { event, error: serializeError(error) });
      }
    };
    this.emitter.on(event, wrapped);
    return () => {
      this.emitter.off(event, wrapped);
    };
  }

  listenerCount(event: JobEventName): number {
    return this.emitter.listenerCount(event);
  }
}
