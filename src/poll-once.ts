/**
 * Homework status bot — Single Poll CLI
 * Run once for testing: npm run poll-once
 */

import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { Poller } from './poller.js';

async function main(): Promise<void> {
    const config = loadConfig();
    const logger = createLogger(config.logging);
    const poller = new Poller(config, logger);

    const outcome = await poller.pollOnce();
    if (outcome.state === 'failed') {
        process.exit(1);
    }
    logger.info(`✅ Poll complete (${outcome.state}), cursor: ${poller.timestamp}`);
}

main().catch((error: unknown) => {
    console.error('❌ Poll failed:', error);
    process.exit(1);
});
