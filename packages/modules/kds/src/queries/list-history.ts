import { parseOrThrow } from '@kitchenflow/shared';
import type { RequestContext } from '@kitchenflow/core';
import type { AuditEntry } from '../types';
import { auditFilterSchema } from '../validation';
import type { AuditFilterInput } from '../validation';
import { getKds } from '../runtime';

export const DEFAULT_HISTORY_LIMIT = 50;

/** Audit entries for the caller's hub, streamed in sequence order. */
export function listHistory(ctx: RequestContext, input: AuditFilterInput = {}): AsyncIterable<AuditEntry> {
  const filter = parseOrThrow(auditFilterSchema, input, 'Invalid history query');
  return getKds().store.queryAudit(ctx.hubId, filter);
}

/** Buffered form of `listHistory`, capped at DEFAULT_HISTORY_LIMIT unless a limit is given. */
export async function collectHistory(ctx: RequestContext, input: AuditFilterInput = {}): Promise<AuditEntry[]> {
  const entries: AuditEntry[] = [];
  for await (const entry of listHistory(ctx, { ...input, limit: input.limit ?? DEFAULT_HISTORY_LIMIT })) {
    entries.push(entry);
  }
  return entries;
}
