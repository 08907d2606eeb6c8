/**
 * Credential checkers
 *
 * A checker answers one question: is this username/password pair valid?
 * Invalid credentials are a plain `false`, never an exception.
 */

export interface CredentialChecker {
  /**
   * Returns true if and only if the username-password pair is valid.
   */
  check(username: string, password: string): boolean;
}

export type CredentialStore = ReadonlyMap<string, string> | Readonly<Record<string, string>>;

/**
 * Checker backed by an in-memory username → password mapping.
 *
 * The store is held by reference, so edits made by its owner show up on the
 * next check. `null`/`undefined` behaves as an empty store.
 */
export class StaticCredentialStore implements CredentialChecker {
  private readonly store: CredentialStore | null;

  constructor(store?: CredentialStore | null) {
    this.store = store ?? null;
  }

  check(username: string, password: string): boolean {
    const expected = this.lookup(username);
    return expected !== undefined && expected === password;
  }

  private lookup(username: string): string | undefined {
    const store = this.store;
    if (store === null) return undefined;
    if (isMap(store)) return store.get(username);
    // Own keys only: `toString`, `__proto__` and friends are not users
    return Object.prototype.hasOwnProperty.call(store, username) ? store[username] : undefined;
  }
}

function isMap(store: CredentialStore): store is ReadonlyMap<string, string> {
  return store instanceof Map;
}

/**
 * Create a checker from a map of user-password pairs.
 *
 * @example
 * ```typescript
 * const checker = credentials({ alice: 'shhhh' });
 * checker.check('alice', 'shhhh'); // true
 * ```
 */
export function credentials(store?: CredentialStore | null): CredentialChecker {
  return new StaticCredentialStore(store);
}

/**
 * Checker that accepts everything. Swap it in to switch auth off without
 * touching the routes it guards.
 */
export class AllowAll implements CredentialChecker {
  check(_username: string, _password: string): boolean {
    return true;
  }
}
