import type { ChangeAction, ChangeEntity, ChangeLogEntry } from '../types';
import type { ServiceContext } from './context';

export interface ChangeInput {
  action: ChangeAction;
  entity: ChangeEntity;
  recordId: string | null;
  fieldName?: string | null;
  oldValue?: string | null;
  newValue?: string | null;
  comment?: string | null;
}

export async function recordChange(ctx: ServiceContext, change: ChangeInput): Promise<ChangeLogEntry> {
  const entry = await ctx.store.appendChange({
    action: change.action,
    entity: change.entity,
    record_id: change.recordId,
    field_name: change.fieldName ?? null,
    old_value: change.oldValue ?? null,
    new_value: change.newValue ?? null,
    comment: change.comment ?? null,
  });
  ctx.logger.debug({
    module: 'services.changeLog',
    action: entry.action,
    entity: entry.entity,
    record_id: entry.record_id,
  }, 'Change logged');
  return entry;
}
