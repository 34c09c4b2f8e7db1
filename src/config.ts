import path from 'node:path'
import { z } from 'zod'

const DEFAULT_SALE_DURATION_MS = 30 * 24 * 60 * 60 * 1000

const envSchema = z.object({
  PRIVATE_KEY: z
    .string({ required_error: 'PRIVATE_KEY not found in .env' })
    .regex(/^[0-9a-fA-F]{64}$/, 'must be a 32-byte hex private key'),
  STORAGE_URL: z.string().url().default('https://storage.babbage.systems'),
  NETWORK: z.enum(['main', 'test']).default('main'),
  PORT: z.coerce.number().int().positive().default(3000),
  CROWDSALE_OWNER_KEY: z.string().regex(/^0[23][0-9a-fA-F]{64}$/, 'must be a compressed public key').optional(),
  CROWDSALE_UNIT_PRICE: z.coerce.number().int().positive().default(1),
  CROWDSALE_FUNDING_OBJECTIVE: z.coerce.number().int().positive().default(100),
  CROWDSALE_START_TIME: z.coerce.date().optional(),
  CROWDSALE_END_TIME: z.coerce.date().optional(),
  CROWDSALE_CAMPAIGN_ID: z.string().min(1).default('crowdsale'),
  CROWDSALE_DATA_FILE: z.string().min(1).optional()
})

export interface WalletSettings {
  privateKey: string
  storageUrl: string
  network: 'main' | 'test'
}

export interface SaleSettings {
  /** Falls back to the backend wallet identity when unset */
  owner?: string
  unitPrice: number
  fundingObjective: number
  startTime?: Date
  endTime: Date
  campaignId: string
}

export interface CrowdsaleConfig {
  port: number
  dataFile: string
  wallet: WalletSettings
  sale: SaleSettings
}

/**
 * Validates the environment and builds the service configuration.
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, now: Date = new Date()): CrowdsaleConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n')
    throw new Error(`Environment validation failed:\n${errors}`)
  }
  const vars = result.data

  const startTime = vars.CROWDSALE_START_TIME
  const endTime = vars.CROWDSALE_END_TIME ?? new Date((startTime ?? now).getTime() + DEFAULT_SALE_DURATION_MS)

  return {
    port: vars.PORT,
    dataFile: vars.CROWDSALE_DATA_FILE ?? path.join(process.cwd(), 'crowdsale-data.json'),
    wallet: {
      privateKey: vars.PRIVATE_KEY,
      storageUrl: vars.STORAGE_URL,
      network: vars.NETWORK
    },
    sale: {
      owner: vars.CROWDSALE_OWNER_KEY,
      unitPrice: vars.CROWDSALE_UNIT_PRICE,
      fundingObjective: vars.CROWDSALE_FUNDING_OBJECTIVE,
      startTime,
      endTime,
      campaignId: vars.CROWDSALE_CAMPAIGN_ID
    }
  }
}
