import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, resolve as resolvePath } from 'node:path';
import type { KeyValueStorage } from './profile-store';

export interface FileStorage extends KeyValueStorage {
    readonly path: string;
    /** Writes every entry back to disk as one JSON object */
    persist(): Promise<void>;
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
    error instanceof Error && 'code' in error;

const readEntries = async (path: string): Promise<Map<string, string>> => {
    let raw: string;
    try {
        raw = await readFile(path, 'utf8');
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
            return new Map();
        }
        throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new Error(`Storage file ${path} must contain a JSON object`);
    }

    const entries = new Map<string, string>();
    for (const [key, value] of Object.entries(parsed)) {
        if (typeof value === 'string') {
            entries.set(key, value);
        }
    }
    return entries;
};

/**
 * Key/value storage for Node hosts, shaped like `localStorage` so the profile
 * store runs unchanged outside the browser.
 */
export const openFileStorage = async (path: string): Promise<FileStorage> => {
    const absolutePath = resolvePath(process.cwd(), path);
    const entries = await readEntries(absolutePath);

    return {
        path: absolutePath,
        getItem: (key) => entries.get(key) ?? null,
        setItem: (key, value) => {
            entries.set(key, value);
        },
        persist: async () => {
            await mkdir(dirname(absolutePath), { recursive: true });
            await writeFile(absolutePath, `${JSON.stringify(Object.fromEntries(entries), null, 2)}\n`, 'utf8');
        },
    };
};
