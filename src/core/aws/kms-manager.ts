/**
 * KMS key lookup for the contact form stack
 */

import { ListAliasesCommand } from '@aws-sdk/client-kms';
import type { DeployContext } from '../context.js';

/**
 * Default alias of the contact form key
 */
export function contactFormKeyAlias(resourcePrefix: string): string {
  return `alias/${resourcePrefix}-contact-form`;
}

/**
 * Find the key id behind an alias (all pages of ListAliases)
 *
 * @returns the key id, or null when no such alias exists
 */
export async function findKeyIdByAlias(context: DeployContext, aliasName: string): Promise<string | null> {
  const wanted = aliasName.startsWith('alias/') ? aliasName : `alias/${aliasName}`;
  let marker: string | undefined;

  do {
    const response = await context.clients.kms.send(new ListAliasesCommand({ Marker: marker }));

    const match = response.Aliases?.find((alias) => alias.AliasName === wanted);
    if (match?.TargetKeyId) {
      return match.TargetKeyId;
    }

    marker = response.Truncated ? response.NextMarker : undefined;
  } while (marker);

  return null;
}
