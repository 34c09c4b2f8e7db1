/**
 * Crowdsale errors
 *
 * Every rejected ledger operation throws one of these. Route handlers map
 * `code` to an HTTP status.
 */

export type CrowdsaleErrorCode =
  | 'INVALID_AMOUNT'
  | 'NOT_OWNER'
  | 'ALREADY_FINALIZED'
  | 'REFUND_NOT_ALLOWED'
  | 'NO_FUNDS_TO_REFUND'
  | 'TRANSFER_FAILED'
  | 'CONSTRUCTION_INVALID'
  | 'ISSUANCE_FAILED'
  | 'PAYMENT_REJECTED'
  | 'PERSISTENCE_FAILED'
  | 'REENTRANT_CALL'

export class CrowdsaleError extends Error {
  readonly code: CrowdsaleErrorCode

  constructor(code: CrowdsaleErrorCode, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'CrowdsaleError'
    this.code = code
  }
}

export class InvalidAmountError extends CrowdsaleError {
  constructor(amount: number) {
    super('INVALID_AMOUNT', `Invalid amount: ${amount}`)
    this.name = 'InvalidAmountError'
  }
}

export class NotOwnerError extends CrowdsaleError {
  constructor(caller: string) {
    super('NOT_OWNER', `Caller is not the crowdsale owner: ${caller}`)
    this.name = 'NotOwnerError'
  }
}

export class AlreadyFinalizedError extends CrowdsaleError {
  constructor() {
    super('ALREADY_FINALIZED', 'Crowdsale already finalized')
    this.name = 'AlreadyFinalizedError'
  }
}

export class RefundNotAllowedError extends CrowdsaleError {
  constructor() {
    super('REFUND_NOT_ALLOWED', 'Refunds are not allowed')
    this.name = 'RefundNotAllowedError'
  }
}

export class NoFundsToRefundError extends CrowdsaleError {
  constructor(contributor: string) {
    super('NO_FUNDS_TO_REFUND', `No funds to refund for ${contributor}`)
    this.name = 'NoFundsToRefundError'
  }
}

export class TransferFailedError extends CrowdsaleError {
  constructor(recipient: string, amount: number, cause: unknown) {
    super('TRANSFER_FAILED', `Transfer of ${amount} to ${recipient} failed`, { cause })
    this.name = 'TransferFailedError'
  }
}

export class ConstructionInvalidError extends CrowdsaleError {
  constructor(reason: string) {
    super('CONSTRUCTION_INVALID', `Invalid crowdsale: ${reason}`)
    this.name = 'ConstructionInvalidError'
  }
}

export class IssuanceFailedError extends CrowdsaleError {
  constructor(operation: 'mint' | 'release', cause: unknown) {
    super('ISSUANCE_FAILED', `Token ${operation} failed`, { cause })
    this.name = 'IssuanceFailedError'
  }
}

export class PaymentRejectedError extends CrowdsaleError {
  constructor(reason: string, cause?: unknown) {
    super('PAYMENT_REJECTED', `Payment not accepted: ${reason}`, { cause })
    this.name = 'PaymentRejectedError'
  }
}

export class PersistenceFailedError extends CrowdsaleError {
  constructor(cause: unknown) {
    super('PERSISTENCE_FAILED', 'Crowdsale state could not be saved', { cause })
    this.name = 'PersistenceFailedError'
  }
}

// A collaborator called back into the ledger while one of its operations was running.
export class ReentrantCallError extends CrowdsaleError {
  constructor(operation: string) {
    super('REENTRANT_CALL', `Cannot ${operation} from inside a running ledger operation`)
    this.name = 'ReentrantCallError'
  }
}
