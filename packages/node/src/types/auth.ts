/**
 * Authentication types.
 *
 * Authentication only establishes *who* is calling. What that identity
 * may do is decided by the domain components' capability table.
 */

export interface AuthContext {
  /** "api-key" when secured, "header" for the unsecured X-Actor-Id mode */
  readonly type: "api-key" | "header";
  readonly identity: string;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly identity: string;
}
