import { readFileSync, writeFileSync, existsSync } from 'fs'
import { z } from 'zod'
import { ConstructionInvalidError } from '../src/errors.js'
import type { LedgerSnapshot } from '../src/types.js'

const ledgerSnapshotSchema: z.ZodType<LedgerSnapshot> = z.object({
  version: z.literal(1),
  owner: z.string().min(1),
  startTime: z.string().datetime(),
  endTime: z.string().datetime(),
  unitPrice: z.number().int().positive(),
  fundingObjective: z.number().int().positive(),
  isFinalized: z.boolean(),
  isRefundingAllowed: z.boolean(),
  totalReceived: z.number().int().nonnegative(),
  totalRefunded: z.number().int().nonnegative(),
  contributions: z.array(z.object({
    contributor: z.string().min(1),
    amount: z.number().int().nonnegative()
  }))
})

/**
 * Reads a persisted ledger. Resolves to undefined when nothing was saved yet;
 * an unreadable or malformed file throws rather than starting a fresh sale.
 */
export function loadLedgerSnapshot(dataFile: string): LedgerSnapshot | undefined {
  if (!existsSync(dataFile)) {
    return undefined
  }

  let data: unknown
  try {
    data = JSON.parse(readFileSync(dataFile, 'utf-8'))
  } catch (error) {
    console.error('Error loading crowdsale data:', error)
    throw new ConstructionInvalidError(`cannot read ${dataFile}`)
  }

  const result = ledgerSnapshotSchema.safeParse(data)
  if (!result.success) {
    const issues = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ')
    throw new ConstructionInvalidError(`malformed ${dataFile} (${issues})`)
  }
  return result.data
}

export function saveLedgerSnapshot(dataFile: string, snapshot: LedgerSnapshot): void {
  writeFileSync(dataFile, JSON.stringify(snapshot, null, 2), 'utf-8')
}
