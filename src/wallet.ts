import { PrivateKey, KeyDeriver } from '@bsv/sdk'
import { Wallet, WalletStorageManager, WalletSigner, Services, StorageClient } from '@bsv/wallet-toolbox'
import type { WalletSettings } from './config.js'

export async function initializeBackendWallet(settings: WalletSettings): Promise<Wallet> {
  // Initialize wallet from private key
  const privateKey = PrivateKey.fromHex(settings.privateKey)
  const keyDeriver = new KeyDeriver(privateKey)
  const storageManager = new WalletStorageManager(keyDeriver.identityKey)
  const signer = new WalletSigner(settings.network, keyDeriver, storageManager)
  const services = new Services(settings.network)
  const wallet = new Wallet(signer, services)

  // Setup storage
  const client = new StorageClient(wallet, settings.storageUrl)
  await client.makeAvailable()
  await storageManager.addWalletStorageProvider(client)

  console.log('✓ Backend wallet initialized')
  console.log(`✓ Identity: ${keyDeriver.identityKey}`)
  console.log(`✓ Network: ${settings.network}`)

  return wallet
}
