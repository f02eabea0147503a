/**
 * Operator alerts. Each alert is one timestamped line appended to a log file
 * that a mailer or chat hook can tail.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { logger } from '../shared/logger.js';

export interface AlertSink {
  send(message: string): Promise<void>;
}

export class AlertLog implements AlertSink {
  private readonly path: string;
  private readonly now: () => Date;

  constructor(path: string, now: () => Date = () => new Date()) {
    this.path = path;
    this.now = now;
  }

  async send(message: string): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await appendFile(this.path, `${this.now().toISOString()} ${message}\n`, 'utf-8');
    logger.warn({ alertsLog: this.path }, `Alert: ${message}`);
  }
}
