import type { Request, Response } from 'express';
import { TransportState } from '../../engine/events';

export interface TransportStatusSource {
  readonly transportState: TransportState;
}

export class HealthController {
  constructor(private readonly engine: TransportStatusSource) {}

  public healthCheck(_req: Request, res: Response): void {
    const transport = this.engine.transportState;
    const healthy = transport === TransportState.Connected;
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'degraded',
      transport,
    });
  }
}
