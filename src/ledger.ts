import { AsyncLocalStorage } from 'node:async_hooks'
import {
  AlreadyFinalizedError,
  ConstructionInvalidError,
  InvalidAmountError,
  IssuanceFailedError,
  NoFundsToRefundError,
  NotOwnerError,
  PersistenceFailedError,
  ReentrantCallError,
  RefundNotAllowedError,
  TransferFailedError
} from './errors.js'
import type {
  Contribution,
  CrowdsaleOutcome,
  FundsTransfer,
  IdentityKey,
  Investment,
  LedgerEvent,
  LedgerEventListener,
  LedgerSnapshot,
  LedgerStatus,
  Logger,
  Refund,
  Settlement,
  TokenIssuer
} from './types.js'

export interface CrowdsaleTerms {
  /** Defaults to the clock reading at creation */
  startTime?: Date
  endTime: Date
  unitPrice: number
  fundingObjective: number
}

export interface LedgerDependencies {
  issuer: TokenIssuer
  transfers: FundsTransfer
  clock?: () => Date
  logger?: Logger
  /**
   * Saves the ledger state an operation is about to commit. Called before the
   * collaborator runs, and again with the committed state when it fails.
   */
  persist?: (snapshot: LedgerSnapshot) => void | Promise<void>
}

interface LedgerState {
  owner: IdentityKey
  startMs: number
  endMs: number
  unitPrice: number
  fundingObjective: number
  isFinalized: boolean
  isRefundingAllowed: boolean
  totalReceived: number
  totalRefunded: number
  contributions: Map<IdentityKey, number>
}

const systemClock = (): Date => new Date()

function isPositiveInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0
}

function draftOf(state: LedgerState): LedgerState {
  return { ...state, contributions: new Map(state.contributions) }
}

function snapshotOf(state: LedgerState): LedgerSnapshot {
  return {
    version: 1,
    owner: state.owner,
    startTime: new Date(state.startMs).toISOString(),
    endTime: new Date(state.endMs).toISOString(),
    unitPrice: state.unitPrice,
    fundingObjective: state.fundingObjective,
    isFinalized: state.isFinalized,
    isRefundingAllowed: state.isRefundingAllowed,
    totalReceived: state.totalReceived,
    totalRefunded: state.totalRefunded,
    contributions: [...state.contributions].map(([contributor, amount]) => ({ contributor, amount }))
  }
}

/**
 * Pooled-contribution ledger for a single crowdsale.
 *
 * Operations run one at a time, in call order. Each one works on a draft of
 * the committed state, saves the draft, calls the issuer or the transfer
 * collaborator, and only then commits the draft and publishes its event. A
 * failed call discards the draft, so queries never see uncommitted amounts.
 * A collaborator calling back into the ledger is rejected instead of queued.
 */
export class CrowdsaleLedger {
  private state: LedgerState
  private readonly issuer: TokenIssuer
  private readonly transfers: FundsTransfer
  private readonly clock: () => Date
  private readonly logger: Logger
  private readonly persist?: (snapshot: LedgerSnapshot) => void | Promise<void>
  private readonly listeners = new Set<LedgerEventListener>()
  private readonly trail: LedgerEvent[] = []
  private readonly running = new AsyncLocalStorage<true>()
  private tail: Promise<void> = Promise.resolve()

  private constructor(state: LedgerState, deps: LedgerDependencies) {
    this.state = state
    this.issuer = deps.issuer
    this.transfers = deps.transfers
    this.clock = deps.clock ?? systemClock
    this.logger = deps.logger ?? console
    this.persist = deps.persist
  }

  static create(owner: IdentityKey, terms: CrowdsaleTerms, deps: LedgerDependencies): CrowdsaleLedger {
    const now = (deps.clock ?? systemClock)().getTime()
    const startMs = terms.startTime?.getTime() ?? now
    const endMs = terms.endTime.getTime()

    if (Number.isNaN(startMs) || startMs < now) {
      throw new ConstructionInvalidError('startTime must not be in the past')
    }

    const state: LedgerState = {
      owner,
      startMs,
      endMs,
      unitPrice: terms.unitPrice,
      fundingObjective: terms.fundingObjective,
      isFinalized: false,
      isRefundingAllowed: false,
      totalReceived: 0,
      totalRefunded: 0,
      contributions: new Map()
    }
    assertValidState(state)

    return new CrowdsaleLedger(state, deps)
  }

  /** Rebuilds a persisted ledger. The start time may lie in the past. */
  static restore(snapshot: LedgerSnapshot, deps: LedgerDependencies): CrowdsaleLedger {
    const contributions = new Map<IdentityKey, number>()
    for (const { contributor, amount } of snapshot.contributions) {
      if (contributions.has(contributor)) {
        throw new ConstructionInvalidError(`duplicate contributor ${contributor}`)
      }
      contributions.set(contributor, amount)
    }

    const state: LedgerState = {
      owner: snapshot.owner,
      startMs: Date.parse(snapshot.startTime),
      endMs: Date.parse(snapshot.endTime),
      unitPrice: snapshot.unitPrice,
      fundingObjective: snapshot.fundingObjective,
      isFinalized: snapshot.isFinalized,
      isRefundingAllowed: snapshot.isRefundingAllowed,
      totalReceived: snapshot.totalReceived,
      totalRefunded: snapshot.totalRefunded,
      contributions
    }
    assertValidState(state)

    return new CrowdsaleLedger(state, deps)
  }

  get owner(): IdentityKey {
    return this.state.owner
  }

  get startTime(): Date {
    return new Date(this.state.startMs)
  }

  // Stored but not enforced: invest is accepted outside [startTime, endTime].
  get endTime(): Date {
    return new Date(this.state.endMs)
  }

  get unitPrice(): number {
    return this.state.unitPrice
  }

  get fundingObjective(): number {
    return this.state.fundingObjective
  }

  get isFinalized(): boolean {
    return this.state.isFinalized
  }

  get isRefundingAllowed(): boolean {
    return this.state.isRefundingAllowed
  }

  get totalReceived(): number {
    return this.state.totalReceived
  }

  get totalRefunded(): number {
    return this.state.totalRefunded
  }

  get outcome(): CrowdsaleOutcome {
    if (!this.state.isFinalized) return 'open'
    return this.state.isRefundingAllowed ? 'refunding' : 'released'
  }

  contributionOf(contributor: IdentityKey): number {
    return this.state.contributions.get(contributor) ?? 0
  }

  contributors(): Contribution[] {
    return [...this.state.contributions].map(([contributor, amount]) => ({ contributor, amount }))
  }

  status(): LedgerStatus {
    return {
      owner: this.state.owner,
      startTime: this.startTime.toISOString(),
      endTime: this.endTime.toISOString(),
      unitPrice: this.state.unitPrice,
      fundingObjective: this.state.fundingObjective,
      totalReceived: this.state.totalReceived,
      totalRefunded: this.state.totalRefunded,
      isFinalized: this.state.isFinalized,
      isRefundingAllowed: this.state.isRefundingAllowed,
      outcome: this.outcome,
      contributorCount: this.state.contributions.size
    }
  }

  auditTrail(): readonly LedgerEvent[] {
    return [...this.trail]
  }

  onEvent(listener: LedgerEventListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  invest(contributor: IdentityKey, amount: number): Promise<Investment> {
    return this.exclusive('invest', async () => {
      const committed = this.state
      if (!isPositiveInteger(amount) || !Number.isSafeInteger(committed.totalReceived + amount)) {
        throw new InvalidAmountError(amount)
      }

      const unitsIssued = Math.floor(amount / committed.unitPrice)
      const draft = draftOf(committed)
      draft.contributions.set(contributor, (draft.contributions.get(contributor) ?? 0) + amount)
      draft.totalReceived += amount
      await this.save(draft)

      try {
        await this.issuer.mint(contributor, unitsIssued)
      } catch (error) {
        this.logger.error(`Mint of ${unitsIssued} units for ${contributor} failed:`, error)
        await this.resave()
        throw new IssuanceFailedError('mint', error)
      }

      this.state = draft
      this.publish({
        type: 'InvestmentRecorded',
        contributor,
        amount,
        unitsIssued,
        message: `Investment recorded: ${contributor} contributed ${amount} for ${unitsIssued} units`,
        timestamp: this.clock().getTime()
      })
      return { contributor, amount, unitsIssued, totalReceived: draft.totalReceived }
    })
  }

  finalize(caller: IdentityKey): Promise<Settlement> {
    return this.exclusive<Settlement>('finalize', async () => {
      const committed = this.state
      if (committed.isFinalized) {
        throw new AlreadyFinalizedError()
      }
      if (caller !== committed.owner) {
        throw new NotOwnerError(caller)
      }

      const { totalReceived, fundingObjective } = committed
      const objectiveMet = totalReceived >= fundingObjective
      const draft = draftOf(committed)
      draft.isFinalized = true
      draft.isRefundingAllowed = !objectiveMet
      await this.save(draft)

      if (objectiveMet) {
        try {
          await this.issuer.release()
        } catch (error) {
          this.logger.error('Token release failed:', error)
          await this.resave()
          throw new IssuanceFailedError('release', error)
        }
      }

      this.state = draft
      this.publish(objectiveMet
        ? {
            type: 'ObjectiveMet',
            totalReceived,
            fundingObjective,
            message: `Funding objective met: raised ${totalReceived} of ${fundingObjective}, units released`,
            timestamp: this.clock().getTime()
          }
        : {
            type: 'ObjectiveNotMet',
            totalReceived,
            fundingObjective,
            message: `Funding objective not met: raised ${totalReceived} of ${fundingObjective}, refunds enabled`,
            timestamp: this.clock().getTime()
          })

      return { outcome: objectiveMet ? 'released' : 'refunding', totalReceived, fundingObjective }
    })
  }

  refund(caller: IdentityKey): Promise<Refund> {
    return this.exclusive('refund', async () => {
      const committed = this.state
      if (!committed.isRefundingAllowed) {
        throw new RefundNotAllowedError()
      }

      const amount = this.contributionOf(caller)
      if (amount === 0) {
        throw new NoFundsToRefundError(caller)
      }

      // Saved as paid before the transfer, so a restart never pays twice.
      const draft = draftOf(committed)
      draft.contributions.set(caller, 0)
      draft.totalRefunded += amount
      await this.save(draft)

      try {
        await this.transfers.send(caller, amount)
      } catch (error) {
        this.logger.error(`Refund of ${amount} to ${caller} failed:`, error)
        await this.resave()
        throw new TransferFailedError(caller, amount, error)
      }

      this.state = draft
      this.publish({
        type: 'RefundIssued',
        contributor: caller,
        amount,
        message: `Refund issued: ${amount} returned to ${caller}`,
        timestamp: this.clock().getTime()
      })
      return { contributor: caller, amount, totalRefunded: draft.totalRefunded }
    })
  }

  toSnapshot(): LedgerSnapshot {
    return snapshotOf(this.state)
  }

  private exclusive<T>(operation: string, work: () => Promise<T>): Promise<T> {
    if (this.running.getStore() === true) {
      return Promise.reject(new ReentrantCallError(operation))
    }

    const result = this.tail.then(() => this.running.run(true, work))
    this.tail = result.then(() => undefined, () => undefined)
    return result
  }

  private async save(draft: LedgerState): Promise<void> {
    if (this.persist === undefined) return
    try {
      await this.persist(snapshotOf(draft))
    } catch (error) {
      throw new PersistenceFailedError(error)
    }
  }

  // Puts the committed state back on disk after a collaborator failure.
  private async resave(): Promise<void> {
    if (this.persist === undefined) return
    try {
      await this.persist(snapshotOf(this.state))
    } catch (error) {
      this.logger.error('Could not save the crowdsale state after a failed operation:', error)
    }
  }

  private publish(event: LedgerEvent): void {
    this.trail.push(event)
    this.logger.log(event.message)

    for (const listener of this.listeners) {
      try {
        listener(event)
      } catch (error) {
        this.logger.error(`Ledger event listener failed on ${event.type}:`, error)
      }
    }
  }
}

function assertValidState(state: LedgerState): void {
  if (state.owner.length === 0) {
    throw new ConstructionInvalidError('owner is required')
  }
  if (Number.isNaN(state.startMs)) {
    throw new ConstructionInvalidError('startTime is not a valid instant')
  }
  if (Number.isNaN(state.endMs) || state.endMs < state.startMs) {
    throw new ConstructionInvalidError('endTime must not precede startTime')
  }
  if (!isPositiveInteger(state.unitPrice)) {
    throw new ConstructionInvalidError('unitPrice must be a positive integer')
  }
  if (!isPositiveInteger(state.fundingObjective)) {
    throw new ConstructionInvalidError('fundingObjective must be a positive integer')
  }
  if (state.isRefundingAllowed && !state.isFinalized) {
    throw new ConstructionInvalidError('refunds cannot be allowed before finalization')
  }

  for (const total of [state.totalReceived, state.totalRefunded]) {
    if (!Number.isSafeInteger(total) || total < 0) {
      throw new ConstructionInvalidError(`invalid total ${total}`)
    }
  }

  let outstanding = 0
  for (const amount of state.contributions.values()) {
    if (!Number.isSafeInteger(amount) || amount < 0) {
      throw new ConstructionInvalidError(`invalid contribution amount ${amount}`)
    }
    outstanding += amount
  }
  if (outstanding + state.totalRefunded !== state.totalReceived) {
    throw new ConstructionInvalidError('contributions and refunds do not add up to totalReceived')
  }
}
