import type { CallRecord, CallStateMachine } from '../calls/CallStateMachine';

/** Live dialogs keyed by Call-ID. Terminal calls are removed by the coordinator. */
export class DialogStore {
  private calls: Map<string, CallStateMachine> = new Map();

  public add(call: CallStateMachine): void {
    this.calls.set(call.callId, call);
  }

  public get(callId: string): CallStateMachine | undefined {
    return this.calls.get(callId);
  }

  public remove(callId: string): boolean {
    return this.calls.delete(callId);
  }

  public active(): CallStateMachine[] {
    return [...this.calls.values()].filter(call => !call.isTerminal());
  }

  public all(): CallStateMachine[] {
    return [...this.calls.values()];
  }

  public snapshots(): CallRecord[] {
    return this.all().map(call => call.snapshot());
  }

  public get size(): number {
    return this.calls.size;
  }
}
