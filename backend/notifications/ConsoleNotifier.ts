import type { Notifier } from "../domain/Capabilities";

// Notifications go to the process log. A delivery channel (SMS, email) would
// implement the same Notifier interface.
export class ConsoleNotifier implements Notifier {
  constructor(private readonly recipient?: string) {}

  send(message: string): void {
    const to = this.recipient ? ` -> ${this.recipient}` : "";
    console.log(`[Notify${to}] ${message}`);
  }
}
