/**
 * StakeVote Web Server
 */

import {
  createStakeVote,
  createTestStakeVote,
  Crypto,
  type StakeVote,
} from '../stakevote/index.js';
import { createApp } from './app.js';

// USE_MOCKS=true (or no LEDGER_URL) runs with the in-memory ledger and store
const useMocks = process.env.USE_MOCKS === 'true' || !process.env.LEDGER_URL;

let stakevote: StakeVote;
if (useMocks) {
  stakevote = createTestStakeVote({
    identity: process.env.NODE_PRIVATE_KEY
      ? Crypto.keyPairFromPrivateKey(process.env.NODE_PRIVATE_KEY)
      : undefined,
    config: { adminPublicKey: process.env.ADMIN_PUBLIC_KEY },
  });
  console.log('Running in mock mode (in-memory ledger and store)');
} else {
  stakevote = createStakeVote();
  console.log('Running with real adapters:');
  console.log(`  Ledger: ${process.env.LEDGER_URL}`);
}

const app = createApp(stakevote, {
  rateLimitRequests: parseInt(process.env.RATE_LIMIT_REQUESTS || '30', 10),
  addressRateLimitRequests: parseInt(process.env.RATE_LIMIT_ADDRESS_REQUESTS || '120', 10),
  disableLogging: process.env.DISABLE_LOGGING === 'true',
  enableHSTS: process.env.NODE_ENV === 'production',
});

const PORT = parseInt(process.env.PORT ?? '3000', 10);

const server = app.listen(PORT, () => {
  console.log(`StakeVote server running on port ${PORT}`);
  console.log(`Identity: ${stakevote.identity.publicKey}`);
  console.log(`Admin: ${stakevote.adminGate.adminKey}`);
});

server.on('error', (error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});

function shutdown(signal: string): void {
  console.log(`Received ${signal}, shutting down...`);
  server.close(() => {
    stakevote.stop();
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
