import { LOG_PREFIX } from './constants';

export type ReorderDiagnosticCode =
    | 'empty_list'
    | 'no_row_at_point'
    | 'move_vetoed'
    | 'no_active_session'
    | 'stale_index'
    | 'begin_reorder_missing'
    | 'finish_reorder_missing'
    | 'move_missing';

export interface ReorderDiagnostic {
    code: ReorderDiagnosticCode;
    message: string;
    index?: number;
}

export type ReorderDiagnosticSink = (diagnostic: ReorderDiagnostic) => void;

const DIAGNOSTIC_MESSAGES: Record<ReorderDiagnosticCode, string> = {
    empty_list: 'list has no rows',
    no_row_at_point: 'no row under the pointer',
    move_vetoed: 'data source refused to move the row',
    no_active_session: 'press event arrived without a drag session',
    stale_index: 'row index is outside the current list bounds',
    begin_reorder_missing: 'beginReorder is not implemented',
    finish_reorder_missing: 'finishReorder is not implemented',
    move_missing: 'move is not implemented; rows were reordered visually only',
};

export function createDiagnostic(code: ReorderDiagnosticCode, index?: number): ReorderDiagnostic {
    const diagnostic: ReorderDiagnostic = { code, message: DIAGNOSTIC_MESSAGES[code] };
    if (typeof index === 'number') {
        diagnostic.index = index;
    }
    return diagnostic;
}

export function consoleDiagnosticSink(diagnostic: ReorderDiagnostic): void {
    if (typeof diagnostic.index === 'number') {
        console.debug(LOG_PREFIX, diagnostic.code, diagnostic.message, { index: diagnostic.index });
        return;
    }
    console.debug(LOG_PREFIX, diagnostic.code, diagnostic.message);
}
