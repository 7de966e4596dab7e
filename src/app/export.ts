import { gameConfig } from 'config/game';
import { rootLogger, type Logger } from 'util/log';
import type { AttemptResult } from 'storage/profile-store';

const EXPORT = gameConfig.export;
const LABELS = gameConfig.copy.resultLabels;

export interface ExportSink {
    exportAndShare(userId: number, fileName: string, text: string): Promise<void>;
}

export type ExportOutcome = 'empty' | 'exported' | 'failed';

export interface ExportHistoryOptions {
    readonly userId: number;
    readonly history: readonly AttemptResult[];
    readonly sink: ExportSink;
    readonly logger?: Logger;
}

const resultLabel = (result: AttemptResult): string => (result.completed ? LABELS.answered : LABELS.gaveUp);

export const exportFileName = (userId: number): string => `${EXPORT.fileNamePrefix}${userId}.csv`;

export const exportSubject = (userId: number): string => `${EXPORT.subjectPrefix}${userId}`;

/** Header plus one row per attempt, oldest first, no trailing newline. */
export const formatHistoryCsv = (history: readonly AttemptResult[]): string => {
    const rows = [EXPORT.header.join(',')];
    for (const result of history) {
        rows.push([String(result.level), resultLabel(result), result.elapsedSeconds.toFixed(2)].join(','));
    }
    return rows.join('\n');
};

/** History list line, e.g. `Level 3: Gave up at 4.1s`. */
export const describeAttempt = (result: AttemptResult): string => {
    const seconds = result.elapsedSeconds.toFixed(1);
    const outcome = result.completed ? `Answered in ${seconds}s` : `Gave up at ${seconds}s`;
    return `Level ${result.level}: ${outcome}`;
};

export const exportHistory = async ({ userId, history, sink, logger }: ExportHistoryOptions): Promise<ExportOutcome> => {
    const log = (logger ?? rootLogger).child('export');
    if (history.length === 0) {
        log.info(gameConfig.copy.exportEmpty, { userId });
        return 'empty';
    }

    try {
        await sink.exportAndShare(userId, exportFileName(userId), formatHistoryCsv(history));
        log.info('History exported', { userId, rows: history.length });
        return 'exported';
    } catch (error) {
        log.warn('History export failed', {
            userId,
            message: error instanceof Error ? error.message : String(error),
        });
        return 'failed';
    }
};
