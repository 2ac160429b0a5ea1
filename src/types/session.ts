export type SessionKind = 'agent' | 'terminal';

export const SESSION_KINDS: readonly SessionKind[] = ['agent', 'terminal'];

/** Low-level multiplexer operations. The multiplexer is the source of truth. */
export interface SessionBackend {
  checkAvailable(): Promise<void>;
  hasSession(name: string): Promise<boolean>;
  newSession(name: string, cwd: string, command?: string): Promise<void>;
  /** Resolves once the user detaches. */
  attachSession(name: string): Promise<void>;
  killSession(name: string): Promise<void>;
  renameSession(oldName: string, newName: string): Promise<void>;
  listSessions(): Promise<string[]>;
  isInsideSession(): boolean;
}
