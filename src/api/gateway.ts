/**
 * Gateway discovery and voice region endpoints.
 */

import { ApiResource } from './base.js';
import { Routes } from '../routes/index.js';
import { GatewayBotInfo, GatewayInfo, VoiceRegion } from '../types/index.js';

export class GatewayApi extends ApiResource {
  /**
   * The gateway URL. Needs no authentication.
   */
  async get(): Promise<GatewayInfo> {
    return this.transport.execute<GatewayInfo>({
      method: 'GET',
      route: Routes.gateway,
      auth: false,
      operation: 'gateway.get',
    });
  }

  /**
   * The gateway URL with the recommended shard count and session start limit.
   */
  async getBot(): Promise<GatewayBotInfo> {
    const info = await this.transport.execute<GatewayBotInfo>({
      method: 'GET',
      route: Routes.gatewayBot,
      operation: 'gateway.getBot',
    });
    this.logger.debug('Gateway info fetched', {
      shards: info.shards,
      sessionsRemaining: info.session_start_limit.remaining,
    });
    return info;
  }

  async listVoiceRegions(): Promise<VoiceRegion[]> {
    return this.transport.execute<VoiceRegion[]>({
      method: 'GET',
      route: Routes.voiceRegions,
      operation: 'gateway.listVoiceRegions',
    });
  }
}
