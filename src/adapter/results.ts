// pattern: Functional Core

import type { ToolCallOutcome } from '../tool/types.js';
import type { MissingCorrelationIdPolicy, ProviderName } from './types.js';
import { MissingCorrelationIdError } from './types.js';
import { isRecord } from './decode.js';

function spaced(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(spaced).join(', ')}]`;
  }
  if (isRecord(value)) {
    const members = Object.entries(value).map(([key, member]) => `${JSON.stringify(key)}: ${spaced(member)}`);
    return `{${members.join(', ')}}`;
  }
  return JSON.stringify(value);
}

function escapeNonAscii(text: string): string {
  return text.replace(/[\u0080-\uffff]/g, (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`);
}

/**
 * Result content as sent to providers: `", "` and `": "` separators,
 * non-ASCII characters escaped, an absent result encoded as `{}`.
 */
export function encodeResultContent(result: unknown): string {
  // Round-trip first so toJSON and undefined members behave as in JSON.stringify.
  const normalized: unknown = JSON.parse(JSON.stringify(result ?? {}));
  return escapeNonAscii(spaced(normalized));
}

export function resolveCorrelationId(
  provider: ProviderName,
  outcome: ToolCallOutcome,
  policy: MissingCorrelationIdPolicy,
): string {
  if (outcome.tool_call_id) {
    return outcome.tool_call_id;
  }

  if (policy === 'reject') {
    throw new MissingCorrelationIdError(provider, outcome.tool_name);
  }

  console.warn(
    `[tools] ${provider} result for ${outcome.tool_name} has no tool call id; sending an empty id`,
  );
  return '';
}
