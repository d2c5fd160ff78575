/**
 * Zod schemas for ledger-fixup data structures.
 *
 * IMPORTANT: Split values are stored as decimal strings and are never
 * computed on. The fix-up only moves line-items between accounts.
 */

import { z } from 'zod';
import { LEDGER_FILE_VERSION, LOG_LEVELS, MATCH_FIELDS } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * Decimal amount as string (never native number for money).
 */
const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

const entityId = z.string().min(1);

// ============================================================================
// Ledger File Schemas
// ============================================================================

/**
 * Account record. The account tree is rebuilt from parent_id links;
 * exactly one account (the book's root) has parent_id null.
 */
export const AccountRecordSchema = z.object({
    id: entityId,
    name: z.string(),
    parent_id: entityId.nullable(),
    type: z.string().optional(),
    description: z.string().optional(),
}).passthrough();

export type AccountRecord = z.infer<typeof AccountRecordSchema>;

/**
 * One leg of a transaction.
 */
export const SplitRecordSchema = z.object({
    id: entityId,
    account_id: entityId,
    value: decimalString,
    memo: z.string().optional(),
}).passthrough();

export type SplitRecord = z.infer<typeof SplitRecordSchema>;

export const TransactionRecordSchema = z.object({
    id: entityId,
    date: isoDateString,
    description: z.string(),
    memo: z.string().optional(),
    currency: z.string().optional(),
    splits: z.array(SplitRecordSchema).min(1),
}).passthrough();

export type TransactionRecord = z.infer<typeof TransactionRecordSchema>;

/**
 * Ledger file as stored on disk.
 *
 * Keys not listed here are kept at every level and written back unchanged.
 */
export const LedgerFileSchema = z.object({
    version: z.literal(LEDGER_FILE_VERSION),
    book: z.object({
        name: z.string().optional(),
        root_account_id: entityId,
    }).passthrough(),
    accounts: z.array(AccountRecordSchema),
    transactions: z.array(TransactionRecordSchema),
}).passthrough();

export type LedgerFile = z.infer<typeof LedgerFileSchema>;

// ============================================================================
// Configuration Schemas
// ============================================================================

export const LogLevelSchema = z.enum(LOG_LEVELS);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const MatchFieldSchema = z.enum(MATCH_FIELDS);

export type MatchField = z.infer<typeof MatchFieldSchema>;

/**
 * Optional config file contents. Every key can be overridden from the command line.
 */
export const FixupConfigFileSchema = z
    .object({
        imbalance_pattern: z.string().min(1).optional(),
        match_field: MatchFieldSchema.optional(),
        log_level: LogLevelSchema.optional(),
        dry_run: z.boolean().optional(),
    })
    .strict();

export type FixupConfigFile = z.infer<typeof FixupConfigFileSchema>;
