/**
 * PushDrop scripts for crowdsale units
 *
 * Unit token (1 satoshi, spendable by the beneficiary):
 *   <"CROWDSALE"> <campaign_id> <units> OP_2DROP OP_DROP <beneficiary_pubkey> OP_CHECKSIG
 *
 * Release marker (0 satoshis, unspendable):
 *   OP_FALSE OP_RETURN <"CROWDSALE"> <"RELEASE"> <campaign_id>
 *
 * Units minted for a campaign become transferable once its release marker is
 * on chain.
 */

import { LockingScript, OP, PublicKey, Script, Utils } from '@bsv/sdk'

const CROWDSALE_PROTOCOL = 'CROWDSALE'
const RELEASE_TAG = 'RELEASE'

export interface UnitTokenData {
  campaignId: string
  units: number
  beneficiary: string
}

/**
 * Builds the locking script of a unit token. Throws if the beneficiary is not a
 * valid public key.
 */
export function createUnitTokenScript(data: UnitTokenData): LockingScript {
  const beneficiary = PublicKey.fromString(data.beneficiary)

  const script = new Script()
    .writeBin(Utils.toArray(CROWDSALE_PROTOCOL, 'utf8'))
    .writeBin(Utils.toArray(data.campaignId, 'utf8'))
    .writeBin(encodeUnits(data.units))
    .writeOpCode(OP.OP_2DROP)
    .writeOpCode(OP.OP_DROP)
    .writeBin(Utils.toArray(beneficiary.toString(), 'hex'))
    .writeOpCode(OP.OP_CHECKSIG)

  return new LockingScript(script.chunks)
}

export function parseUnitToken(lockingScript: LockingScript): UnitTokenData | null {
  const chunks = lockingScript.chunks
  if (chunks.length !== 7) return null
  if (chunks[3].op !== OP.OP_2DROP || chunks[4].op !== OP.OP_DROP || chunks[6].op !== OP.OP_CHECKSIG) {
    return null
  }

  const protocol = chunks[0].data
  const campaign = chunks[1].data
  const units = chunks[2].data
  const key = chunks[5].data
  if (protocol === undefined || campaign === undefined || units === undefined || key === undefined) {
    return null
  }
  if (Utils.toUTF8(protocol) !== CROWDSALE_PROTOCOL || units.length !== 8) return null

  return {
    campaignId: Utils.toUTF8(campaign),
    units: decodeUnits(units),
    beneficiary: Utils.toHex(key)
  }
}

export function createReleaseScript(campaignId: string): LockingScript {
  const script = new Script()
    .writeOpCode(OP.OP_FALSE)
    .writeOpCode(OP.OP_RETURN)
    .writeBin(Utils.toArray(CROWDSALE_PROTOCOL, 'utf8'))
    .writeBin(Utils.toArray(RELEASE_TAG, 'utf8'))
    .writeBin(Utils.toArray(campaignId, 'utf8'))

  return new LockingScript(script.chunks)
}

// 8 bytes, little-endian
function encodeUnits(units: number): number[] {
  const buffer = Buffer.alloc(8)
  buffer.writeBigUInt64LE(BigInt(units))
  return Array.from(buffer)
}

function decodeUnits(bytes: number[]): number {
  return Number(Buffer.from(bytes).readBigUInt64LE())
}
