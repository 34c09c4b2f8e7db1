/**
 * Identity keys are compressed secp256k1 public keys in hex, as handed out by
 * the BSV wallet (`getPublicKey({ identityKey: true })`).
 */
export type IdentityKey = string

export interface TokenIssuer {
  /** Credits locked units to the beneficiary. */
  mint(beneficiary: IdentityKey, units: number): Promise<void>
  /** Makes every minted unit transferable. */
  release(): Promise<void>
}

export interface UnitToken {
  /** `txid.vout` of the token output */
  outpoint: string
  units: number
}

export interface UnitTokenSource {
  /** Unit tokens minted to the beneficiary that are still unspent. */
  tokensOf(beneficiary: IdentityKey): Promise<UnitToken[]>
}

export interface FundsTransfer {
  send(recipient: IdentityKey, amount: number): Promise<void>
}

export interface IncomingPayment {
  /** Base64 AtomicBEEF paying the backend wallet in output 0 */
  transaction: string
  senderIdentityKey: IdentityKey
  derivationPrefix: string
  derivationSuffix: string
}

export interface PaymentGateway extends FundsTransfer {
  /** Internalizes the payment and resolves with the satoshis received. */
  receive(payment: IncomingPayment): Promise<number>
}

export type CrowdsaleOutcome = 'open' | 'released' | 'refunding'

export interface Contribution {
  contributor: IdentityKey
  amount: number
}

export interface Investment extends Contribution {
  unitsIssued: number
  totalReceived: number
}

export interface Settlement {
  outcome: Exclude<CrowdsaleOutcome, 'open'>
  totalReceived: number
  fundingObjective: number
}

export interface Refund extends Contribution {
  totalRefunded: number
}

export interface LedgerStatus {
  owner: IdentityKey
  startTime: string
  endTime: string
  unitPrice: number
  fundingObjective: number
  totalReceived: number
  totalRefunded: number
  isFinalized: boolean
  isRefundingAllowed: boolean
  outcome: CrowdsaleOutcome
  contributorCount: number
}

interface LedgerEventBase {
  message: string
  timestamp: number
}

export type LedgerEvent =
  | (LedgerEventBase & { type: 'InvestmentRecorded', contributor: IdentityKey, amount: number, unitsIssued: number })
  | (LedgerEventBase & { type: 'ObjectiveMet', totalReceived: number, fundingObjective: number })
  | (LedgerEventBase & { type: 'ObjectiveNotMet', totalReceived: number, fundingObjective: number })
  | (LedgerEventBase & { type: 'RefundIssued', contributor: IdentityKey, amount: number })

export type LedgerEventListener = (event: LedgerEvent) => void

export type Logger = Pick<Console, 'log' | 'error'>

// Persisted form of a ledger, written as JSON.
export interface LedgerSnapshot {
  version: 1
  owner: IdentityKey
  startTime: string
  endTime: string
  unitPrice: number
  fundingObjective: number
  isFinalized: boolean
  isRefundingAllowed: boolean
  totalReceived: number
  totalRefunded: number
  contributions: Contribution[]
}
