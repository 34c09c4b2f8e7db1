import { LockingScript } from '@bsv/sdk'
import type { WalletInterface } from '@bsv/sdk'
import { createReleaseScript, createUnitTokenScript, parseUnitToken } from './pushdrop.js'
import type { IdentityKey, Logger, TokenIssuer, UnitToken, UnitTokenSource } from './types.js'

export type IssuerWallet = Pick<WalletInterface, 'createAction' | 'listOutputs'>

export interface WalletTokenIssuerOptions {
  campaignId: string
  basket?: string
  logger?: Logger
}

/**
 * Issues units as PushDrop tokens from the backend wallet.
 *
 * Each mint is its own 1-satoshi output locked to the beneficiary. Release
 * publishes the campaign's release marker.
 */
export class WalletTokenIssuer implements TokenIssuer, UnitTokenSource {
  private readonly campaignId: string
  private readonly basket: string
  private readonly logger: Logger
  private released = false

  constructor(
    private readonly wallet: IssuerWallet,
    options: WalletTokenIssuerOptions
  ) {
    this.campaignId = options.campaignId
    this.basket = options.basket ?? 'crowdsale'
    this.logger = options.logger ?? console
  }

  async mint(beneficiary: IdentityKey, units: number): Promise<void> {
    if (units === 0) return

    const lockingScript = createUnitTokenScript({ campaignId: this.campaignId, units, beneficiary })
    const result = await this.wallet.createAction({
      description: 'Mint crowdsale units',
      outputs: [
        {
          lockingScript: lockingScript.toHex(),
          satoshis: 1,
          basket: this.basket,
          outputDescription: `${units} crowdsale units`
        }
      ],
      options: {
        randomizeOutputs: false
      }
    })

    this.logger.log(`✅ Minted ${units} units for ${beneficiary.slice(0, 16)}... (txid: ${result.txid ?? 'unknown'})`)
  }

  async release(): Promise<void> {
    if (this.released) {
      throw new Error(`Campaign ${this.campaignId} already released`)
    }

    const result = await this.wallet.createAction({
      description: 'Release crowdsale units',
      outputs: [
        {
          lockingScript: createReleaseScript(this.campaignId).toHex(),
          satoshis: 0,
          outputDescription: 'Crowdsale release marker'
        }
      ]
    })
    this.released = true

    this.logger.log(`✅ Released campaign ${this.campaignId} (txid: ${result.txid ?? 'unknown'})`)
  }

  async tokensOf(beneficiary: IdentityKey): Promise<UnitToken[]> {
    const { outputs } = await this.wallet.listOutputs({
      basket: this.basket,
      include: 'locking scripts',
      limit: 10000
    })

    const tokens: UnitToken[] = []
    for (const output of outputs) {
      if (output.lockingScript === undefined) continue
      const token = parseUnitToken(LockingScript.fromHex(output.lockingScript))
      if (token?.campaignId === this.campaignId && token.beneficiary === beneficiary) {
        tokens.push({ outpoint: output.outpoint, units: token.units })
      }
    }
    return tokens
  }
}

export interface IssuedUnits {
  locked: number
  transferable: number
}

/** Keeps issued units in memory. Starts with zero supply. */
export class InMemoryTokenIssuer implements TokenIssuer {
  private readonly balances = new Map<IdentityKey, number>()
  private released = false

  get isReleased(): boolean {
    return this.released
  }

  get totalSupply(): number {
    let total = 0
    for (const units of this.balances.values()) total += units
    return total
  }

  async mint(beneficiary: IdentityKey, units: number): Promise<void> {
    if (!Number.isSafeInteger(units) || units < 0) {
      throw new Error(`Invalid unit count: ${units}`)
    }
    this.balances.set(beneficiary, (this.balances.get(beneficiary) ?? 0) + units)
  }

  async release(): Promise<void> {
    if (this.released) {
      throw new Error('Units already released')
    }
    this.released = true
  }

  unitsOf(beneficiary: IdentityKey): IssuedUnits {
    const units = this.balances.get(beneficiary) ?? 0
    return this.released ? { locked: 0, transferable: units } : { locked: units, transferable: 0 }
  }
}
