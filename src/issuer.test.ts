import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { Mock } from 'vitest'
import { PrivateKey } from '@bsv/sdk'
import type { CreateActionArgs, ListOutputsArgs, ListOutputsResult } from '@bsv/sdk'
import { InMemoryTokenIssuer, WalletTokenIssuer } from './issuer.js'
import { createReleaseScript, createUnitTokenScript } from './pushdrop.js'

const TXID = 'ab'.repeat(32)

describe('WalletTokenIssuer', () => {
  const beneficiary = PrivateKey.fromRandom().toPublicKey().toString()
  let createAction: Mock<(args: CreateActionArgs) => Promise<{ txid: string }>>
  let listOutputs: Mock<(args: ListOutputsArgs) => Promise<ListOutputsResult>>
  let issuer: WalletTokenIssuer

  beforeEach(() => {
    createAction = vi.fn(async (_args: CreateActionArgs) => ({ txid: TXID }))
    listOutputs = vi.fn(async (_args: ListOutputsArgs): Promise<ListOutputsResult> => ({ totalOutputs: 0, outputs: [] }))
    issuer = new WalletTokenIssuer({ createAction, listOutputs }, {
      campaignId: 'spring-sale',
      logger: { log: vi.fn(), error: vi.fn() }
    })
  })

  it('mints one token output locked to the beneficiary', async () => {
    await issuer.mint(beneficiary, 4)

    expect(createAction).toHaveBeenCalledTimes(1)
    expect(createAction.mock.calls[0][0]).toEqual({
      description: 'Mint crowdsale units',
      outputs: [{
        lockingScript: createUnitTokenScript({ campaignId: 'spring-sale', units: 4, beneficiary }).toHex(),
        satoshis: 1,
        basket: 'crowdsale',
        outputDescription: '4 crowdsale units'
      }],
      options: { randomizeOutputs: false }
    })
  })

  it('skips the wallet when there are no units to mint', async () => {
    await issuer.mint(beneficiary, 0)

    expect(createAction).not.toHaveBeenCalled()
  })

  it('publishes the release marker once', async () => {
    await issuer.release()

    expect(createAction.mock.calls[0][0]).toEqual({
      description: 'Release crowdsale units',
      outputs: [{
        lockingScript: createReleaseScript('spring-sale').toHex(),
        satoshis: 0,
        outputDescription: 'Crowdsale release marker'
      }]
    })
    await expect(issuer.release()).rejects.toThrow('Campaign spring-sale already released')
    expect(createAction).toHaveBeenCalledTimes(1)
  })

  it('can release again after a failed broadcast', async () => {
    createAction.mockRejectedValueOnce(new Error('broadcast failed'))

    await expect(issuer.release()).rejects.toThrow('broadcast failed')
    await expect(issuer.release()).resolves.toBeUndefined()
    expect(createAction).toHaveBeenCalledTimes(2)
  })
})

describe('WalletTokenIssuer.tokensOf', () => {
  const beneficiary = PrivateKey.fromRandom().toPublicKey().toString()
  const other = PrivateKey.fromRandom().toPublicKey().toString()

  it('lists the beneficiary\'s unit tokens of this campaign', async () => {
    const listOutputs = vi.fn(async (_args: ListOutputsArgs): Promise<ListOutputsResult> => ({
      totalOutputs: 5,
      outputs: [
        {
          outpoint: `${TXID}.0`,
          satoshis: 1,
          spendable: true,
          lockingScript: createUnitTokenScript({ campaignId: 'spring-sale', units: 4, beneficiary }).toHex()
        },
        {
          outpoint: `${TXID}.1`,
          satoshis: 1,
          spendable: true,
          lockingScript: createUnitTokenScript({ campaignId: 'spring-sale', units: 2, beneficiary: other }).toHex()
        },
        {
          outpoint: `${TXID}.2`,
          satoshis: 1,
          spendable: true,
          lockingScript: createUnitTokenScript({ campaignId: 'autumn-sale', units: 9, beneficiary }).toHex()
        },
        { outpoint: `${TXID}.3`, satoshis: 0, spendable: true, lockingScript: createReleaseScript('spring-sale').toHex() },
        { outpoint: `${TXID}.4`, satoshis: 1, spendable: true }
      ]
    }))
    const issuer = new WalletTokenIssuer({ createAction: vi.fn(), listOutputs }, { campaignId: 'spring-sale' })

    await expect(issuer.tokensOf(beneficiary)).resolves.toEqual([{ outpoint: `${TXID}.0`, units: 4 }])
    expect(listOutputs).toHaveBeenCalledWith({ basket: 'crowdsale', include: 'locking scripts', limit: 10000 })
  })
})

describe('InMemoryTokenIssuer', () => {
  it('keeps minted units locked until release', async () => {
    const issuer = new InMemoryTokenIssuer()
    await issuer.mint('alice-key', 3)
    await issuer.mint('alice-key', 2)
    await issuer.mint('bob-key', 7)

    expect(issuer.totalSupply).toBe(12)
    expect(issuer.unitsOf('alice-key')).toEqual({ locked: 5, transferable: 0 })

    await issuer.release()

    expect(issuer.isReleased).toBe(true)
    expect(issuer.unitsOf('alice-key')).toEqual({ locked: 0, transferable: 5 })
    expect(issuer.unitsOf('carol-key')).toEqual({ locked: 0, transferable: 0 })
  })

  it('rejects negative unit counts and a second release', async () => {
    const issuer = new InMemoryTokenIssuer()

    await expect(issuer.mint('alice-key', -1)).rejects.toThrow('Invalid unit count: -1')
    await issuer.release()
    await expect(issuer.release()).rejects.toThrow('Units already released')
  })
})
