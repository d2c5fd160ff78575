import { copyFileSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { LedgerFileSchema } from '@ledger-fixup/shared';

const FIXTURES = fileURLToPath(new URL('./fixtures/', import.meta.url));

export interface TempWorkspace {
    dir: string;
    ledgerPath: string;
    rulesPath: string;
    write(name: string, content: string): string;
    read(name: string): string;
    cleanup(): void;
}

/**
 * Temp directory holding copies of the fixture ledger and rules file.
 */
export function makeTempWorkspace(): TempWorkspace {
    const dir = mkdtempSync(join(tmpdir(), 'ledger-fixup-'));
    const ledgerPath = join(dir, 'ledger.json');
    const rulesPath = join(dir, 'rules.txt');
    copyFileSync(join(FIXTURES, 'ledger.json'), ledgerPath);
    copyFileSync(join(FIXTURES, 'rules.txt'), rulesPath);

    return {
        dir,
        ledgerPath,
        rulesPath,
        write(name, content) {
            const path = join(dir, name);
            writeFileSync(path, content);
            return path;
        },
        read(name) {
            return readFileSync(join(dir, name), 'utf8');
        },
        cleanup() {
            rmSync(dir, { recursive: true, force: true });
        },
    };
}

/**
 * Account id of each split in a stored ledger file, keyed by split id.
 */
export function storedAssignments(ledgerPath: string): Record<string, string> {
    const file = LedgerFileSchema.parse(JSON.parse(readFileSync(ledgerPath, 'utf8')));
    const assignments: Record<string, string> = {};
    for (const txn of file.transactions) {
        for (const split of txn.splits) {
            assignments[split.id] = split.account_id;
        }
    }
    return assignments;
}
