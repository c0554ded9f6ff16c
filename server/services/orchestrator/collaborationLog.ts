/**
 * Collaboration Log
 *
 * Ordered record of the commands one orchestration issued between agents
 * and tools. Ids start at 1 for every request.
 */

import type { CollaborationLog as CollaborationLogSnapshot, CommandRecord, CommandStatus } from '@shared/schema';

export type CompletionStatus = Exclude<CommandStatus, 'pending'>;

export class CollaborationLog {
  private readonly commands: CommandRecord[] = [];
  private readonly startedAt: string;
  private endedAt?: string;
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {
    this.startedAt = this.now().toISOString();
  }

  /** Record a new pending command and return its id. */
  send(from: string, to: string, command: string, params: Record<string, unknown> = {}): number {
    const record: CommandRecord = {
      id: this.nextId++,
      from,
      to,
      command,
      params,
      status: 'pending',
      timestamp: this.now().toISOString(),
    };
    this.commands.push(record);
    console.log(`[Collaboration] #${record.id} ${from} → ${to}: ${command}`);
    return record.id;
  }

  complete(id: number, status: CompletionStatus, result?: string): void {
    const record = this.commands.find((c) => c.id === id);
    if (!record) {
      console.warn(`[Collaboration] Unknown command id ${id}`);
      return;
    }
    record.status = status;
    record.completedAt = this.now().toISOString();
    if (result !== undefined) record.result = result;

    const line = `[Collaboration] #${id} ${record.command} ${status}${result ? `: ${result}` : ''}`;
    if (status === 'failed') console.warn(line);
    else console.log(line);
  }

  finish(): void {
    this.endedAt = this.now().toISOString();
  }

  get size(): number {
    return this.commands.length;
  }

  snapshot(): CollaborationLogSnapshot {
    return {
      startedAt: this.startedAt,
      ...(this.endedAt ? { endedAt: this.endedAt } : {}),
      commands: this.commands.map((c) => ({ ...c, params: { ...c.params } })),
    };
  }
}
