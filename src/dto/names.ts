import { camelize } from '../config/index.js';
import type { DTODirection } from '../core/types.js';

/** Every transfer model name handed out in this process. */
const seenModelNames = new Set<string>();

/**
 * Reserves a process-unique transfer model name.
 *
 * Tries `${ShortPrefix}${model}${suffix}` first, then the long prefix (the
 * handler id up to `::`), then the long name with the first free `_n` counter.
 *
 * @example
 * ```ts
 * reserveTransferModelName('users.getUser', 'User', 'return'); // 'GetUserUserResponseBody'
 * reserveTransferModelName('admin.getUser', 'User', 'return'); // 'admin.getUserUserResponseBody'
 * ```
 */
export function reserveTransferModelName(handlerId: string, modelName: string, direction: DTODirection): string {
  const longPrefix = handlerId.split('::')[0] ?? handlerId;
  const shortPrefix = camelize(longPrefix.split('.').pop() ?? longPrefix, true);
  const suffix = direction === 'data' ? 'RequestBody' : 'ResponseBody';

  const shortName = `${shortPrefix}${modelName}${suffix}`;
  const longName = `${longPrefix}${modelName}${suffix}`;

  let name = shortName;
  if (seenModelNames.has(name)) {
    name = longName;
  }
  for (let counter = 0; seenModelNames.has(name); counter++) {
    name = `${longName}_${counter}`;
  }

  seenModelNames.add(name);
  return name;
}

export function isTransferModelNameTaken(name: string): boolean {
  return seenModelNames.has(name);
}

/** Forgets every reserved name. Test teardown only. */
export function clearTransferModelNames(): void {
  seenModelNames.clear();
}
