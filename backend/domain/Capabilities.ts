// Optional collaborators an entity may hold.
// Both are fire-and-forget: a failing sink must never break the calling operation.

export interface AuditLogger {
  record(eventText: string): void;
}

export interface Notifier {
  send(message: string): void;
}

export interface EntityCapabilities {
  readonly auditLogger?: AuditLogger;
  readonly notifier?: Notifier;
}

export function safeRecord(logger: AuditLogger | undefined, eventText: string): void {
  if (!logger) return;
  try {
    logger.record(eventText);
  } catch (err) {
    console.error("[Audit] Sink rejected event:", err instanceof Error ? err.message : err);
  }
}

export function safeNotify(notifier: Notifier | undefined, message: string): void {
  if (!notifier) return;
  try {
    notifier.send(message);
  } catch (err) {
    console.error("[Notify] Sink rejected message:", err instanceof Error ? err.message : err);
  }
}
