import 'dotenv/config';
import { createApp } from './app.js';
import { createChainNode } from './chain/node.js';
import { isStrictMode, loadChainConfig, type ChainConfig } from './config/chain.js';
import { createHttpTransport } from './crosschain/transport.js';
import {
  createOnchainMembershipOracle,
  createStaticMembershipOracle,
  type MembershipOracle,
} from './services/membership.js';

function membershipFor(config: ChainConfig): MembershipOracle {
  if (config.membership.mode === 'onchain') {
    return createOnchainMembershipOracle({
      rpcUrl: config.rpcUrl,
      whitelistContract: config.membership.whitelistContract,
    });
  }
  return createStaticMembershipOracle({
    whitelist: config.membership.whitelist,
    balances: config.membership.balances,
  });
}

const config = loadChainConfig();

for (const domain of config.trustedRemotes.keys()) {
  if (!config.peers[domain]) {
    console.warn(`[server] no peer URL for domain ${domain}; sends to it will fail with DISPATCH_FAILED`);
  }
}

const node = createChainNode({
  chainId: config.chainId,
  administrator: config.administrator,
  gatewayAddress: config.gatewayAddress,
  creationFee: config.creationFee,
  trustedRemotes: config.trustedRemotes,
  membership: membershipFor(config),
  transport: createHttpTransport({ peers: config.peers }),
  stateDir: config.stateDir,
  logFile: config.logFile,
});

const app = createApp(node, { name: config.name, strictMode: isStrictMode() });

// ─── Start ──────────────────────────────────────────────
app.listen(config.port, () => {
  console.log(`crossvote node for ${config.name} (${config.chainId}) on http://localhost:${config.port}`);
  console.log(`   Config:  ${config.source ?? '(defaults + env)'}`);
  console.log(`   Health:  http://localhost:${config.port}/health`);
  console.log(`   Events:  http://localhost:${config.port}/api/events`);
});
