/**
 * Record backend contract shared by tinydns and nsupdate
 */
export interface RecordBackend {
  /** Short name used in logs and errors */
  readonly name: string;
  /** Reject when the backend cannot be used at all; called before any mutation */
  probe(): Promise<void>;
  /** TXT values currently held at `name`, in backend order; empty when there are none */
  read(name: string): Promise<string[]>;
  add(name: string, value: string): Promise<void>;
  remove(name: string, value: string): Promise<void>;
  /** Persist or publish pending changes */
  commit(): Promise<void>;
}
