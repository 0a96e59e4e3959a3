/**
 * Base class shared by the resource APIs.
 */

import { DiscordTransport } from '../transport/index.js';
import { Logger } from '../observability/index.js';

export abstract class ApiResource {
  protected readonly transport: DiscordTransport;
  protected readonly logger: Logger;

  constructor(transport: DiscordTransport, logger: Logger) {
    this.transport = transport;
    this.logger = logger;
  }
}
