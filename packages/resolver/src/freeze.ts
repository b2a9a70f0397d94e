/**
 * Immutability for the values the resolver hands out: object paths,
 * search policies, candidate lists and loaded configurations.
 */

/**
 * Freezes a plain data tree in place and returns it.
 *
 * Subtrees that are already frozen are not walked again, so freezing a
 * configuration that embeds DEFAULT_SEARCH_POLICY stops at the policy.
 */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== "object") {
    return value;
  }

  const pending: object[] = [value];
  for (let node = pending.pop(); node !== undefined; node = pending.pop()) {
    if (Object.isFrozen(node)) continue;
    Object.freeze(node);
    for (const child of Object.values(node)) {
      if (child !== null && typeof child === "object") {
        pending.push(child);
      }
    }
  }

  return value;
}
