/**
 * Filters over users, channels, messages and files. Predicates combine with
 * `and` / `or`; chaining the same combinator flattens into one child list,
 * mixing them nests: `a.or(b).and(c)` is `(a | b) & c`.
 */
import type { SlackUser } from "../model/user.js";

export type PredicateFn<T> = (obj: T) => boolean;

export type PredicateLike<T> = PredicateFn<T> | Predicate<T>;

function evaluate<T>(predicate: PredicateLike<T>, obj: T): boolean {
  return typeof predicate === "function" ? predicate(obj) : predicate.test(obj);
}

export abstract class Predicate<T> {
  abstract test(obj: T): boolean;

  and<U>(other: PredicateLike<U>): Predicate<T & U> {
    return new AndPredicate<T & U>([this, other]);
  }

  or<U>(other: PredicateLike<U>): Predicate<T & U> {
    return new OrPredicate<T & U>([this, other]);
  }

  /**
   * Plain function form, for `Array.prototype.filter` and friends.
   */
  get fn(): PredicateFn<T> {
    return (obj) => this.test(obj);
  }
}

class FnPredicate<T> extends Predicate<T> {
  constructor(private readonly predicate: PredicateFn<T>) {
    super();
  }

  test(obj: T): boolean {
    return this.predicate(obj);
  }
}

/**
 * True when every child is; an empty AND is true.
 */
export class AndPredicate<T> extends Predicate<T> {
  constructor(readonly children: readonly PredicateLike<T>[] = []) {
    super();
  }

  test(obj: T): boolean {
    return this.children.every((child) => evaluate(child, obj));
  }

  override and<U>(other: PredicateLike<U>): Predicate<T & U> {
    if (other instanceof AndPredicate) {
      return new AndPredicate<T & U>([...this.children, ...other.children]);
    }
    return new AndPredicate<T & U>([...this.children, other]);
  }
}

/**
 * True when any child is; an empty OR is false.
 */
export class OrPredicate<T> extends Predicate<T> {
  constructor(readonly children: readonly PredicateLike<T>[] = []) {
    super();
  }

  test(obj: T): boolean {
    return this.children.some((child) => evaluate(child, obj));
  }

  override or<U>(other: PredicateLike<U>): Predicate<T & U> {
    if (other instanceof OrPredicate) {
      return new OrPredicate<T & U>([...this.children, ...other.children]);
    }
    return new OrPredicate<T & U>([...this.children, other]);
  }
}

export function predicate<T>(fn: PredicateFn<T>): Predicate<T> {
  return new FnPredicate(fn);
}

export function and<T>(predicates: readonly PredicateLike<T>[]): AndPredicate<T> {
  return new AndPredicate(predicates);
}

export function or<T>(predicates: readonly PredicateLike<T>[]): OrPredicate<T> {
  return new OrPredicate(predicates);
}

// Capabilities the leaf predicates read

export interface Pinnable {
  readonly pinned: boolean;
}

export interface BotFlagged {
  readonly bot: boolean;
}

export interface Named {
  readonly name: string;
}

export interface UserIdentity {
  readonly id: string;
  readonly name: string;
  readonly displayName: string;
  readonly email: string;
  readonly realName: string;
}

export interface HasMembers {
  readonly knownMembers: readonly SlackUser[];
}

export interface Authored {
  readonly user: SlackUser | null;
}

function fullMatch(pattern: string): RegExp {
  return new RegExp(`^(?:${pattern})$`, "i");
}

export function isNotPinned(): Predicate<Pinnable> {
  return predicate<Pinnable>((obj) => !obj.pinned);
}

export function isBot(): Predicate<BotFlagged> {
  return predicate<BotFlagged>((obj) => obj.bot);
}

/** An optional text attribute named `K`. */
export type TextAttribute<K extends string> = { readonly [P in K]?: string | null };

/**
 * Case-insensitive full match of `pattern` against `attr` (default "name").
 */
export function match(pattern: string): Predicate<TextAttribute<"name">>;
export function match<K extends string>(pattern: string, attr: K): Predicate<TextAttribute<K>>;
export function match(pattern: string, attr = "name"): Predicate<TextAttribute<string>> {
  const regex = fullMatch(pattern);
  return predicate<TextAttribute<string>>((obj) => regex.test(obj[attr] ?? ""));
}

export function isName(name: string): Predicate<Named> {
  return predicate<Named>((obj) => obj.name === name);
}

export function matchText(pattern: string): Predicate<TextAttribute<"text">> {
  return match(pattern, "text");
}

/**
 * Matches users whose id, name, display name, email or real name fully
 * matches `pattern`, checked in that order.
 */
export function matchUser(pattern: string): Predicate<UserIdentity> {
  const regex = fullMatch(pattern);
  return predicate<UserIdentity>((user) =>
    [user.id, user.name, user.displayName, user.email, user.realName].some((field) =>
      regex.test(field ?? "")
    )
  );
}

/**
 * Channels whose loaded member list contains `user`. The list is empty until
 * `channel.members()` has been awaited, so a fresh channel never matches.
 */
export function isMember(user: SlackUser): Predicate<HasMembers> {
  return predicate<HasMembers>((channel) => channel.knownMembers.includes(user));
}

export function byUser(user: SlackUser): Predicate<Authored> {
  return predicate<Authored>((obj) => obj.user === user);
}

export function byUsers(users: Iterable<SlackUser>): Predicate<Authored> {
  const set = new Set(users);
  return predicate<Authored>((obj) => obj.user !== null && set.has(obj.user));
}
