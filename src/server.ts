import 'dotenv/config'
import { openCrowdsale } from '../lib/crowdsale.js'
import { createApp } from './app.js'
import { loadConfig } from './config.js'
import { WalletTokenIssuer } from './issuer.js'
import { WalletPaymentGateway } from './payments.js'
import { initializeBackendWallet } from './wallet.js'

async function startServer() {
  const config = loadConfig()

  // Initialize backend wallet
  const wallet = await initializeBackendWallet(config.wallet)
  const { publicKey: identityKey } = await wallet.getPublicKey({ identityKey: true })

  const payments = new WalletPaymentGateway(wallet)
  const issuer = new WalletTokenIssuer(wallet, { campaignId: config.sale.campaignId })
  const ledger = openCrowdsale({
    dataFile: config.dataFile,
    owner: config.sale.owner ?? identityKey,
    terms: config.sale,
    issuer,
    transfers: payments
  })

  const app = createApp({ ledger, payments, tokens: issuer, identityKey })

  app.listen(config.port, () => {
    console.log(`Crowdsale server running on http://localhost:${config.port}`)
    console.log(`Objective: ${ledger.fundingObjective} satoshis at ${ledger.unitPrice} satoshis per unit`)
  })
}

startServer().catch((error) => {
  console.error('Failed to start crowdsale server:', error)
  process.exit(1)
})
