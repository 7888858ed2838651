/**
 * Port Registry
 *
 * Process-wide lease table for physical ports. One owner holds a port at a
 * time; the DAC and ADC share the MCU UART, so whichever link opens it first
 * must close it before another link can take it.
 */

import { PortUnavailableError } from '../../utils/errors.js';
import { log } from '../../utils/logger.js';

export class PortRegistry {
  private readonly leases = new Map<string, string>();
  private readonly logger = log.child({ service: 'port-registry' });

  /**
   * Take the lease on `path` for `owner`. Re-acquiring an own lease is a no-op.
   */
  acquire(path: string, owner: string): void {
    const holder = this.leases.get(path);
    if (holder !== undefined && holder !== owner) {
      throw new PortUnavailableError(path, `held by ${holder}`, {
        operation: 'acquire',
        owner,
        holder,
      });
    }
    this.leases.set(path, owner);
    this.logger.debug('Port lease acquired', { port: path, owner });
  }

  /**
   * Give the lease back. Returns false when `owner` was not holding it.
   */
  release(path: string, owner: string): boolean {
    if (this.leases.get(path) !== owner) return false;
    this.leases.delete(path);
    this.logger.debug('Port lease released', { port: path, owner });
    return true;
  }

  holder(path: string): string | undefined {
    return this.leases.get(path);
  }
}

export const portRegistry = new PortRegistry();
