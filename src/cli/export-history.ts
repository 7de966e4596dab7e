import { mkdir, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve as resolvePath } from 'node:path';
import { exportHistory, type ExportOutcome, type ExportSink } from 'app/export';
import { openFileStorage } from 'storage/file-storage';
import { createProfileStore } from 'storage/profile-store';
import type { Logger } from 'util/log';

export interface ExportCommandInput {
    readonly userId: number;
    readonly storePath: string;
    /** Directory the CSV is written to; the OS temp directory by default */
    readonly outDir?: string;
    readonly logger?: Logger;
}

export interface ExportCommandResult {
    readonly ok: boolean;
    readonly userId: number;
    readonly outcome: ExportOutcome;
    readonly rows: number;
    readonly path: string | null;
}

export interface FileExportSink extends ExportSink {
    readonly writtenPaths: () => readonly string[];
}

export const createFileExportSink = (outDir: string): FileExportSink => {
    const directory = resolvePath(process.cwd(), outDir);
    const written: string[] = [];

    return {
        exportAndShare: async (_userId, fileName, text) => {
            await mkdir(directory, { recursive: true });
            const target = join(directory, fileName);
            await writeFile(target, text, 'utf8');
            written.push(target);
        },
        writtenPaths: () => written.slice(),
    };
};

export const runExport = async (input: ExportCommandInput): Promise<ExportCommandResult> => {
    const storage = await openFileStorage(input.storePath);
    const store = createProfileStore({ storage, logger: input.logger });
    const profile = await store.loadProfile(input.userId);
    if (!profile) {
        throw new Error(`No profile stored for user ${input.userId}`);
    }

    const sink = createFileExportSink(input.outDir ?? tmpdir());
    const outcome = await exportHistory({
        userId: profile.userId,
        history: profile.history,
        sink,
        logger: input.logger,
    });

    return {
        ok: outcome !== 'failed',
        userId: profile.userId,
        outcome,
        rows: profile.history.length,
        path: sink.writtenPaths()[0] ?? null,
    };
};
