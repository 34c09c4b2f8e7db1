import { P2PKH, PublicKey, Transaction, Utils } from '@bsv/sdk'
import type { InternalizeActionResult, WalletInterface } from '@bsv/sdk'
import { InvalidAmountError, PaymentRejectedError } from './errors.js'
import type { IdentityKey, IncomingPayment, Logger, PaymentGateway } from './types.js'

export type PaymentWallet = Pick<WalletInterface, 'internalizeAction' | 'createAction'>

/**
 * Moves satoshis in and out of the backend wallet: investor payments arrive
 * as BRC-29 remittances, refunds leave as P2PKH outputs to the investor's
 * identity address.
 */
export class WalletPaymentGateway implements PaymentGateway {
  private readonly logger: Logger

  constructor(private readonly wallet: PaymentWallet, logger?: Logger) {
    this.logger = logger ?? console
  }

  async receive(payment: IncomingPayment): Promise<number> {
    const tx = Utils.toArray(payment.transaction, 'base64')
    let parsedTx: Transaction
    try {
      parsedTx = Transaction.fromAtomicBEEF(tx)
    } catch (error) {
      throw new PaymentRejectedError('malformed transaction', error)
    }

    // The payment is the first output
    const amount = parsedTx.outputs[0]?.satoshis ?? 0
    if (amount === 0) {
      throw new InvalidAmountError(amount)
    }

    let result: InternalizeActionResult
    try {
      result = await this.wallet.internalizeAction({
        tx,
        outputs: [{
          outputIndex: 0,
          protocol: 'wallet payment',
          paymentRemittance: {
            derivationPrefix: payment.derivationPrefix,
            derivationSuffix: payment.derivationSuffix,
            senderIdentityKey: payment.senderIdentityKey
          }
        }],
        description: 'Crowdsale investment'
      })
    } catch (error) {
      throw new PaymentRejectedError(error instanceof Error ? error.message : String(error), error)
    }

    if (!result.accepted) {
      throw new PaymentRejectedError(`wallet refused payment from ${payment.senderIdentityKey}`)
    }

    this.logger.log('Payment internalized:', { amount, sender: payment.senderIdentityKey })
    return amount
  }

  async send(recipient: IdentityKey, amount: number): Promise<void> {
    const address = PublicKey.fromString(recipient).toAddress()
    const result = await this.wallet.createAction({
      description: 'Crowdsale refund',
      outputs: [
        {
          lockingScript: new P2PKH().lock(address).toHex(),
          satoshis: amount,
          outputDescription: `Refund of ${amount} sats`
        }
      ]
    })

    this.logger.log(`✅ Refunded ${amount} sats to ${recipient.slice(0, 16)}... (txid: ${result.txid ?? 'unknown'})`)
  }
}
