import { EventEmitter } from 'node:events';
import type { Job } from '../domain/entities/Job.js';

export type JobChangeKind = 'created' | 'status';

export type JobChange = {
  job: Job;
  change: JobChangeKind;
  timestamp: string;
};

type JobChangeListener = (change: JobChange) => void;

/**
 * Fan-out of committed job snapshots within this process.
 * Only records already persisted by the store are published.
 */
export class JobEventBus {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  subscribe(listener: JobChangeListener): () => void {
    this.emitter.on('job', listener);
    return () => {
      this.emitter.off('job', listener);
    };
  }

  publish(job: Job, change: JobChangeKind): void {
    const payload: JobChange = { job, change, timestamp: new Date().toISOString() };
    this.emitter.emit('job', payload);
  }
}
