import type { RegistrationRecord, RegistrationStateMachine } from '../registration/RegistrationStateMachine';

/** Registration machines of this engine, keyed by `user@domain`. */
export class RegistrationStore {
  private machines: Map<string, RegistrationStateMachine>;

  constructor() {
    this.machines = new Map();
  }

  private buildKey(key: string): string {
    return key.toLowerCase();
  }

  public upsert(machine: RegistrationStateMachine): void {
    this.machines.set(this.buildKey(machine.key), machine);
  }

  public get(key: string): RegistrationStateMachine | undefined {
    return this.machines.get(this.buildKey(key));
  }

  public remove(key: string): boolean {
    return this.machines.delete(this.buildKey(key));
  }

  /** First registration whose username matches, used to route inbound INVITEs. */
  public findByUser(username: string): RegistrationStateMachine | undefined {
    const wanted = username.toLowerCase();
    for (const machine of this.machines.values()) {
      if (machine.account.username.toLowerCase() === wanted) return machine;
    }
    return undefined;
  }

  public all(): RegistrationStateMachine[] {
    return [...this.machines.values()];
  }

  public snapshots(): RegistrationRecord[] {
    return this.all().map(machine => machine.snapshot());
  }

  public get size(): number {
    return this.machines.size;
  }
}
