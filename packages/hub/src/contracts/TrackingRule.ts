/**
 * Tracking Rule Contract
 *
 * Adapters self-declare which event or property kinds they receive.
 * A rule is a policy plus a set of kind tags:
 *
 * - `allow`    - deliver only the listed kinds
 * - `prohibit` - deliver everything except the listed kinds
 *
 * An adapter without a rule receives everything.
 */

/**
 * Rule polarity.
 */
export type TrackingPolicy = "allow" | "prohibit";

/**
 * Allow/prohibit filter over kind tags.
 */
export interface TrackingRule {
    /** Whether the listed kinds are the only ones delivered, or the only ones withheld */
    readonly policy: TrackingPolicy;

    /** Kind tags the policy applies to */
    readonly kinds: ReadonlySet<string>;
}

/**
 * Build a tracking rule.
 *
 * @example
 * ```typescript
 * // Only purchases reach the revenue adapter
 * const revenueRule = createTrackingRule("allow", ["cart-checked-out"]);
 *
 * // Everything but heartbeats reaches the console
 * const quietRule = createTrackingRule("prohibit", ["heartbeat"]);
 * ```
 */
export function createTrackingRule(policy: TrackingPolicy, kinds: Iterable<string>): TrackingRule {
    return Object.freeze({
        policy,
        kinds: new Set(kinds),
    });
}

/**
 * Decide whether an item of the given kind goes to an adapter with the given rule.
 *
 * An empty `allow` set delivers nothing and an empty `prohibit` set
 * delivers everything. Unknown kinds are simply not included.
 *
 * @param rule - The adapter's rule, if any
 * @param kind - Kind tag of the candidate event or property
 * @returns True if the adapter should receive the item
 */
export function shouldDeliver(rule: TrackingRule | undefined, kind: string): boolean {
    if (!rule) {
        return true;
    }

    const included = rule.kinds.has(kind);

    return (included && rule.policy === "allow") || (!included && rule.policy === "prohibit");
}
