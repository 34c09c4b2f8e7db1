import express from 'express'
import type { Express, NextFunction, Request, Response } from 'express'
import { z } from 'zod'
import { CrowdsaleError } from './errors.js'
import type { CrowdsaleErrorCode } from './errors.js'
import type { CrowdsaleLedger } from './ledger.js'
import type { Investment, Logger, PaymentGateway, UnitTokenSource } from './types.js'

export interface AppDependencies {
  ledger: CrowdsaleLedger
  payments: PaymentGateway
  tokens: UnitTokenSource
  /** Backend wallet identity key */
  identityKey: string
  logger?: Logger
}

const investSchema = z.object({
  transaction: z.string().min(1),
  investorKey: z.string().min(1),
  derivationPrefix: z.string().min(1),
  derivationSuffix: z.string().min(1)
})

const callerSchema = z.object({
  identityKey: z.string().min(1)
})

const STATUS_BY_CODE: Record<CrowdsaleErrorCode, number> = {
  INVALID_AMOUNT: 400,
  NO_FUNDS_TO_REFUND: 400,
  PAYMENT_REJECTED: 400,
  NOT_OWNER: 403,
  ALREADY_FINALIZED: 409,
  REFUND_NOT_ALLOWED: 409,
  TRANSFER_FAILED: 502,
  ISSUANCE_FAILED: 502,
  REENTRANT_CALL: 409,
  CONSTRUCTION_INVALID: 500,
  PERSISTENCE_FAILED: 500
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>

// Express 4 does not forward rejected promises to the error handler.
function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next)
  }
}

export function createApp(deps: AppDependencies): Express {
  const { ledger, payments, tokens, identityKey } = deps
  const logger = deps.logger ?? console
  const app = express()

  // Middleware
  app.use(express.json())
  app.use(express.urlencoded({ extended: true }))

  // CORS
  app.use((req, res, next) => {
    res.header('Access-Control-Allow-Origin', '*')
    res.header('Access-Control-Allow-Headers', '*')
    res.header('Access-Control-Allow-Methods', '*')
    res.header('Access-Control-Expose-Headers', '*')
    if (req.method === 'OPTIONS') {
      res.sendStatus(200)
    } else {
      next()
    }
  })

  app.get('/wallet-info', (_req, res) => {
    res.json({ identityKey })
  })

  app.get('/status', (_req, res) => {
    const status = ledger.status()
    res.json({
      ...status,
      investorCount: status.contributorCount,
      percentFunded: Math.round((status.totalReceived / status.fundingObjective) * 100)
    })
  })

  app.get('/investors', (_req, res) => {
    const investors = ledger.contributors()
    res.json({
      investorCount: investors.length,
      totalRaised: ledger.totalReceived,
      investors: investors.map(inv => ({ identityKey: inv.contributor, amount: inv.amount }))
    })
  })

  app.get('/contributions/:identityKey', (req, res) => {
    const contributor = req.params.identityKey
    res.json({ identityKey: contributor, amount: ledger.contributionOf(contributor) })
  })

  app.get('/tokens/:identityKey', route(async (req, res) => {
    const owner = req.params.identityKey
    const held = await tokens.tokensOf(owner)
    res.json({
      identityKey: owner,
      units: held.reduce((sum, token) => sum + token.units, 0),
      transferable: ledger.outcome === 'released',
      tokens: held
    })
  }))

  // Accepts a payment transaction and records the investment
  app.post('/invest', route(async (req, res) => {
    const body = investSchema.safeParse(req.body)
    if (!body.success) {
      res.status(400).json({ error: 'Missing required payment data' })
      return
    }
    const { transaction, investorKey, derivationPrefix, derivationSuffix } = body.data

    const amount = await payments.receive({
      transaction,
      senderIdentityKey: investorKey,
      derivationPrefix,
      derivationSuffix
    })
    let investment: Investment
    try {
      investment = await ledger.invest(investorKey, amount)
    } catch (error) {
      // The wallet already holds the payment; send it back before reporting.
      try {
        await payments.send(investorKey, amount)
        logger.log(`Returned ${amount} sats to ${investorKey} after a failed investment`)
      } catch (returnError) {
        logger.error(`Could not return ${amount} sats to ${investorKey}:`, returnError)
      }
      throw error
    }

    res.json({
      success: true,
      amount: investment.amount,
      unitsIssued: investment.unitsIssued,
      totalRaised: investment.totalReceived,
      message: 'Investment received! Units will be released if the funding objective is met.'
    })
  }))

  app.post('/finalize', route(async (req, res) => {
    const body = callerSchema.safeParse(req.body)
    if (!body.success) {
      res.status(400).json({ error: 'Missing or invalid identityKey parameter' })
      return
    }

    const settlement = await ledger.finalize(body.data.identityKey)
    res.json({
      success: true,
      ...settlement,
      message: settlement.outcome === 'released'
        ? 'Funding objective met! Units released to investors.'
        : 'Funding objective not met. Investors may now claim refunds.'
    })
  }))

  app.post('/refund', route(async (req, res) => {
    const body = callerSchema.safeParse(req.body)
    if (!body.success) {
      res.status(400).json({ error: 'Missing or invalid identityKey parameter' })
      return
    }

    const refund = await ledger.refund(body.data.identityKey)
    res.json({
      success: true,
      amount: refund.amount,
      totalRefunded: refund.totalRefunded
    })
  }))

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error)
      return
    }
    if (error instanceof CrowdsaleError) {
      res.status(STATUS_BY_CODE[error.code]).json({ error: error.message, code: error.code })
      return
    }
    logger.error('Request failed:', error)
    res.status(500).json({ error: 'Internal server error' })
  })

  return app
}
