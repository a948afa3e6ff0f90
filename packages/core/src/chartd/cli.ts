#!/usr/bin/env node
/**
 * chartd CLI - Crypto chart MCP server
 *
 * Usage:
 *   chartd start             Start the server
 *   chartd config            Show configuration
 *   chartd refresh-catalog   Download a fresh coin list
 */

import 'dotenv/config';
import { Daemon, refreshCatalog } from './daemon.js';
import { Config } from './config.js';
import { Logger } from './logger.js';
import { SERVER_VERSION } from '../index.js';
import { errorMessage } from '../errors.js';

// ANSI color codes
const RESET = '\x1b[0m';
const WHITE = '\x1b[97m';
const CYAN = '\x1b[96m';
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';

const BANNER = `
${CYAN}╔═══════════════════════════════════════════════════╗${RESET}
${CYAN}║${RESET}   ${WHITE}${BOLD}chartd${RESET} ${DIM}v${SERVER_VERSION}${RESET}  ${CYAN}Crypto charts over MCP${RESET}            ${CYAN}║${RESET}
${CYAN}╚═══════════════════════════════════════════════════╝${RESET}
`;

const HELP = `${BANNER}
${WHITE}${BOLD}USAGE${RESET}
  ${CYAN}chartd${RESET} <command> [options]

${WHITE}${BOLD}COMMANDS${RESET}
  ${CYAN}start${RESET}             Start the MCP server
  ${CYAN}config${RESET}            Show current configuration
  ${CYAN}refresh-catalog${RESET}   Download the CoinMarketCap coin list
  ${CYAN}version${RESET}           Show version

${WHITE}${BOLD}OPTIONS${RESET}
  ${CYAN}--port${RESET} <n>        HTTP port ${DIM}(default: 8430)${RESET}
  ${CYAN}--data${RESET} <dir>      Data directory ${DIM}(default: ~/.chartd)${RESET}
  ${CYAN}--transport${RESET} <t>   stdio or http ${DIM}(default: http)${RESET}
  ${CYAN}--verbose${RESET}         Enable verbose logging
  ${CYAN}--help${RESET}            Show this help

${WHITE}${BOLD}ENVIRONMENT${RESET}
  ${CYAN}CMC_API_KEY${RESET}            CoinMarketCap API key
  ${CYAN}CHARTD_BEARER_SECRET${RESET}   Token HTTP clients must send ${DIM}(required for http)${RESET}
  ${CYAN}CHARTD_PUBLIC_URL${RESET}      Base of the chart links ${DIM}(default: http://localhost:<port>)${RESET}

${WHITE}${BOLD}EXAMPLES${RESET}
  ${DIM}$${RESET} chartd start                       ${DIM}# HTTP on port 8430${RESET}
  ${DIM}$${RESET} chartd start --transport stdio     ${DIM}# For a local MCP client${RESET}
  ${DIM}$${RESET} chartd refresh-catalog             ${DIM}# Update the coin list${RESET}
`;

export function parseArgs(args: string[]): { command: string | undefined; options: Record<string, string | boolean> } {
  const options: Record<string, string | boolean> = {};
  for (let i = 1; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      const key = args[i].slice(2);
      const nextArg = args[i + 1];
      if (nextArg && !nextArg.startsWith('--')) {
        options[key] = nextArg;
        i++;
      } else {
        options[key] = true;
      }
    }
  }
  return { command: args[0], options };
}

async function main() {
  const { command, options } = parseArgs(process.argv.slice(2));

  if (options.help || command === 'help' || command === '--help' || command === '-h' || command === undefined) {
    console.log(HELP);
    return;
  }
  if (command === 'version' || command === '--version' || command === '-v') {
    console.log(`${CYAN}chartd${RESET} v${SERVER_VERSION}`);
    return;
  }

  const config = new Config(options);
  const logger = new Logger({ verbose: config.verbose });

  switch (command) {
    case 'start':
      await startDaemon(config, logger);
      break;

    case 'config':
      showConfig(config);
      break;

    case 'refresh-catalog':
      await runRefresh(config, logger);
      break;

    default:
      console.error(`Unknown command: ${command}`);
      console.error(`Run "${CYAN}chartd --help${RESET}" for usage.`);
      process.exit(1);
  }
}

async function startDaemon(config: Config, logger: Logger) {
  // stdout belongs to MCP in stdio mode
  console.error(BANNER);
  logger.info(`${CYAN}Starting chartd...${RESET}`);

  const daemon = new Daemon(config, logger);

  const shutdown = () => {
    logger.info('Shutting down...');
    daemon.stop()
      .then(() => process.exit(0))
      .catch(error => {
        logger.error(`Shutdown failed: ${errorMessage(error)}`, error);
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await daemon.start();
}

function showConfig(config: Config) {
  console.log(`\n${CYAN}chartd Configuration${RESET}`);
  console.log(`${CYAN}${'─'.repeat(50)}${RESET}`);
  for (const [key, value] of Object.entries(config.describe())) {
    console.log(`  ${WHITE}${key}:${RESET}${' '.repeat(Math.max(1, 22 - key.length))}${value}`);
  }
  console.log(`${CYAN}${'─'.repeat(50)}${RESET}`);
  console.log(`  ${DIM}Config file:${RESET}           ${config.configPath}`);
  console.log('');
}

async function runRefresh(config: Config, logger: Logger) {
  logger.info(`${CYAN}Refreshing coin list...${RESET}`);
  const count = await refreshCatalog(config, logger);
  logger.success(`Wrote ${count} assets to ${config.coinListPath}`);
}

main().catch((err) => {
  console.error('Fatal error:', errorMessage(err));
  process.exit(1);
});
