import type { KeyCollisionPolicy } from '../config.js';
import { DutError } from '../errors.js';

export type Reply = string | number | boolean | null | Reply[] | ReplyObject;

export interface ReplyObject {
  [key: string]: Reply;
}

export type KeyTransform = (key: string) => string;

export interface NormalizeKeysOptions {
  onCollision?: KeyCollisionPolicy;
}

const UPPERCASE_BOUNDARY = /(?<!^)(?=[A-Z])/g;

/**
 * Converts camelCase keys to snake_case, one `/`-separated segment at a time,
 * so `modelName` becomes `model_name` and `fooBar/bazQux` becomes `foo_bar/baz_qux`.
 * Output is always lowercase, which makes a second application a no-op.
 */
export function camelToSnake(key: string): string {
  return key
    .split('/')
    .map((segment) => segment.replace(UPPERCASE_BOUNDARY, '_').toLowerCase())
    .join('/');
}

export function isReplyObject(value: Reply): value is ReplyObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function normalizeAt(value: Reply, transform: KeyTransform, policy: KeyCollisionPolicy, path: string): Reply {
  if (Array.isArray(value)) {
    return value.map((item, index) => normalizeAt(item, transform, policy, `${path}[${index}]`));
  }

  if (!isReplyObject(value)) {
    return value;
  }

  // Object.fromEntries defines own keys, so a "__proto__" key survives.
  const entries = new Map<string, Reply>();
  const sourceKeys = new Map<string, string>();

  for (const [key, nested] of Object.entries(value)) {
    const renamed = transform(key);
    const previous = sourceKeys.get(renamed);
    if (previous !== undefined && policy === 'error') {
      throw new DutError(
        'KEY_COLLISION',
        `Reply keys "${previous}" and "${key}" both normalize to "${renamed}" at ${path}`,
        { details: { path, keys: [previous, key], target: renamed } }
      );
    }
    sourceKeys.set(renamed, key);
    entries.set(renamed, normalizeAt(nested, transform, policy, `${path}.${renamed}`));
  }

  return Object.fromEntries(entries);
}

/**
 * Renames every mapping key in `reply` with `transform`. Arrays and scalars keep
 * their shape; only keys change. With `last-wins`, a later key overwrites an earlier
 * one that normalized to the same name but keeps the earlier key's position.
 */
export function normalizeKeys(reply: Reply, transform: KeyTransform, options: NormalizeKeysOptions = {}): Reply {
  return normalizeAt(reply, transform, options.onCollision ?? 'error', '$');
}
