import type { Gateway } from './Gateway.js';
import type { ExitReason } from './types.js';

const EXIT_MESSAGES: Record<ExitReason, string> = {
  graceful: 'graceful shutdown',
  interrupted: 'interrupt (SIGINT)',
  eof: 'end of input (serial port closed)',
};

/**
 * Runs `gateway` until it stops, turning SIGINT into an interrupt. Each way
 * of ending is logged on its own line; a serial fault propagates.
 */
export async function runGateway(gateway: Gateway): Promise<ExitReason> {
  const onSigint = () => gateway.interrupt();
  process.once('SIGINT', onSigint);

  console.info('[Gateway] starting...');
  try {
    const reason = await gateway.start();
    console.info(`[Gateway] exiting via: ${EXIT_MESSAGES[reason]}`);
    return reason;
  } finally {
    process.off('SIGINT', onSigint);
  }
}
