// Pod Message Queue
// In-process mailboxes between pods of one session, first in first out per recipient

import { LoggerPort } from '../../domain/ports/logger';

export interface PodMessage {
  from: string;
  to: string;
  payload: unknown;
}

export class PodMessageQueue {
  private mailboxes = new Map<string, PodMessage[]>();

  constructor(private logger: LoggerPort) {}

  send(from: string, to: string, payload: unknown): void {
    const mailbox = this.mailboxes.get(to) ?? [];
    mailbox.push({ from, to, payload });
    this.mailboxes.set(to, mailbox);
    this.logger.logVerbose('PodMessageQueue', 'Message queued', { from, to, pending: mailbox.length });
  }

  /**
   * Next message for the pod, or null when its mailbox is empty
   */
  receive(pod: string): PodMessage | null {
    return this.mailboxes.get(pod)?.shift() ?? null;
  }

  pending(pod: string): number {
    return this.mailboxes.get(pod)?.length ?? 0;
  }
}
