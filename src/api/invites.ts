/**
 * Invite endpoints.
 */

import { ApiResource } from './base.js';
import { Routes } from '../routes/index.js';
import { Invite } from '../types/index.js';

export interface GetInviteParams {
  withCounts?: boolean;
  withExpiration?: boolean;
}

/**
 * Accepts a bare code or an invite link.
 */
export function toInviteCode(codeOrUrl: string): string {
  const match = /(?:discord\.gg|discord(?:app)?\.com\/invite)\/([\w-]+)\/?$/.exec(codeOrUrl.trim());
  return match ? match[1] : codeOrUrl.trim();
}

export class InvitesApi extends ApiResource {
  async get(code: string, params: GetInviteParams = {}): Promise<Invite> {
    return this.transport.execute<Invite>({
      method: 'GET',
      route: Routes.invite,
      params: { invite_code: toInviteCode(code) },
      query: { with_counts: params.withCounts, with_expiration: params.withExpiration },
      operation: 'invites.get',
    });
  }

  async delete(code: string, reason?: string): Promise<Invite> {
    const invite = await this.transport.execute<Invite>({
      method: 'DELETE',
      route: Routes.invite,
      params: { invite_code: toInviteCode(code) },
      reason,
      operation: 'invites.delete',
    });
    this.logger.info('Invite deleted', { code: invite.code });
    return invite;
  }
}
