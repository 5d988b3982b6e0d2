/**
 * Homework status bot — Entry Point
 * Continuous polling mode
 */

import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { Poller } from './poller.js';

const config = loadConfig();
const logger = createLogger(config.logging);
const poller = new Poller(config, logger);

// Graceful shutdown
process.on('SIGINT', () => {
    poller.stop();
    process.exit(0);
});
process.on('SIGTERM', () => {
    poller.stop();
    process.exit(0);
});

await poller.start();
