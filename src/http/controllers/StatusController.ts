import type { Request, Response } from 'express';
import type { CallRecord } from '../../calls/CallStateMachine';
import type { RegistrationRecord } from '../../registration/RegistrationStateMachine';

export interface EngineStatusSource {
  getRegistrations(): RegistrationRecord[];
  getCalls(): CallRecord[];
}

const toIso = (value?: Date): string | null => (value ? value.toISOString() : null);

export class StatusController {
  constructor(private readonly engine: EngineStatusSource) {}

  public accounts(_req: Request, res: Response): void {
    const accounts = this.engine
      .getRegistrations()
      .map(record => ({
        account: record.account,
        state: record.state,
        expiresSeconds: record.expiresSeconds ?? null,
        lastRegistrationTime: toIso(record.lastRegistrationTime),
        nextRegistrationTime: toIso(record.nextRegistrationTime),
        failureCount: record.failureCount,
        lastError: record.lastError ?? null,
      }))
      .sort((a, b) => a.account.localeCompare(b.account));

    res.json({ total: accounts.length, accounts });
  }

  public calls(_req: Request, res: Response): void {
    const calls = this.engine.getCalls().map(call => ({
      callId: call.callId,
      account: call.account,
      direction: call.direction,
      state: call.state,
      remoteUri: call.remoteUri,
      remoteHold: call.remoteHold,
      startedAt: call.startedAt.toISOString(),
      connectedAt: toIso(call.connectedAt),
    }));

    res.json({ total: calls.length, calls });
  }
}
