/**
 * Application endpoints.
 */

import { ApiResource } from './base.js';
import { Routes } from '../routes/index.js';
import { Application } from '../types/index.js';

export class ApplicationsApi extends ApiResource {
  /**
   * The application that owns the bot token.
   */
  async getCurrent(): Promise<Application> {
    return this.transport.execute<Application>({
      method: 'GET',
      route: Routes.currentApplication,
      operation: 'applications.getCurrent',
    });
  }
}
