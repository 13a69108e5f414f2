const PREFIX = '[relay-tunnel]';

const colors = {
  reset: '\x1b[0m',
  cyan: '\x1b[36m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  dim: '\x1b[2m',
};

function debugEnabled(): boolean {
  const flag = process.env.RELAY_TUNNEL_DEBUG;
  return flag !== undefined && flag !== '' && flag !== '0' && flag !== 'false';
}

export const logger = {
  info(msg: string): void {
    console.log(`${colors.cyan}${PREFIX}${colors.reset} ${msg}`);
  },

  warn(msg: string): void {
    console.warn(`${colors.yellow}${PREFIX}${colors.reset} ${msg}`);
  },

  error(msg: string): void {
    console.error(`${colors.red}${PREFIX}${colors.reset} ${msg}`);
  },

  success(msg: string): void {
    console.log(`${colors.green}${PREFIX}${colors.reset} ${msg}`);
  },

  debug(msg: string): void {
    if (!debugEnabled()) return;
    console.log(`${colors.dim}${PREFIX} ${msg}${colors.reset}`);
  },

  tunnel(id: string, event: string, failed = false): void {
    const eventColor = failed ? colors.red : colors.green;
    console.log(`${colors.dim}${PREFIX}${colors.reset} ${id} ${eventColor}${event}${colors.reset}`);
  },
};
