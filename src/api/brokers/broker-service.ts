/**
 * Broker Service
 *
 * Uniform async access to the configured broker gateways. A gateway may answer
 * synchronously or return a promise; every call here is awaited either way.
 */

import { componentLogger } from "../../utils/logger.js";
import type {
  BrokerAccountInfo,
  BrokerGateway,
  BrokerPosition,
  BrokerRegistry,
} from "../../types/broker.js";

const log = componentLogger("brokers");

export class BrokerService {
  constructor(private readonly brokers: BrokerRegistry) {}

  /** Configured broker names, in registration order */
  get brokerNames(): string[] {
    return Object.keys(this.brokers);
  }

  getBrokerInstance(broker: string): BrokerGateway {
    log.debug(`Getting broker instance for ${broker}`);
    const instance = this.brokers[broker];
    if (!instance) {
      throw new Error(`Unknown broker: ${broker}`);
    }
    return instance;
  }

  async getLatestPrice(broker: string, symbol: string): Promise<number | null> {
    const price = await this.getBrokerInstance(broker).getCurrentPrice(symbol);
    return typeof price === "number" && Number.isFinite(price) ? price : null;
  }

  /** Throws when any quantity is not a finite number */
  async getPositions(broker: string): Promise<Record<string, BrokerPosition>> {
    const positions = await this.getBrokerInstance(broker).getPositions();
    for (const [symbol, position] of Object.entries(positions)) {
      if (!Number.isFinite(position.quantity)) {
        throw new Error(`Broker ${broker} reported a non-finite quantity for ${symbol}`);
      }
    }
    return positions;
  }

  /** Throws when the account value is not a finite number */
  async getAccountInfo(broker: string): Promise<BrokerAccountInfo> {
    const info = await this.getBrokerInstance(broker).getAccountInfo();
    if (!Number.isFinite(info.value)) {
      throw new Error(`Broker ${broker} reported a non-finite account value`);
    }
    return info;
  }

  async getCostBasis(broker: string, symbol: string): Promise<number | null> {
    const costBasis = await this.getBrokerInstance(broker).getCostBasis(symbol);
    return typeof costBasis === "number" && Number.isFinite(costBasis) ? costBasis : null;
  }
}
