import { CrowdsaleLedger } from '../src/ledger.js'
import type { CrowdsaleTerms, LedgerDependencies } from '../src/ledger.js'
import type { IdentityKey, LedgerSnapshot } from '../src/types.js'
import { loadLedgerSnapshot, saveLedgerSnapshot } from './storage.js'

export interface OpenCrowdsaleOptions extends Omit<LedgerDependencies, 'persist'> {
  dataFile: string
  owner: IdentityKey
  terms: CrowdsaleTerms
}

/**
 * Restores the crowdsale persisted in `dataFile`, or creates it from the
 * configured terms. Every operation writes the file before it moves funds or
 * tokens, and fails when the write does.
 */
export function openCrowdsale(options: OpenCrowdsaleOptions): CrowdsaleLedger {
  const { dataFile, owner, terms, ...rest } = options
  const logger = rest.logger ?? console
  const deps = {
    ...rest,
    persist: (snapshot: LedgerSnapshot) => saveLedgerSnapshot(dataFile, snapshot)
  }

  const snapshot = loadLedgerSnapshot(dataFile)
  let ledger: CrowdsaleLedger
  if (snapshot) {
    ledger = CrowdsaleLedger.restore(snapshot, deps)
    logger.log('Loaded crowdsale state:', ledger.status())
  } else {
    ledger = CrowdsaleLedger.create(owner, terms, deps)
    saveLedgerSnapshot(dataFile, ledger.toSnapshot())
    logger.log('Created crowdsale:', ledger.status())
  }

  return ledger
}
