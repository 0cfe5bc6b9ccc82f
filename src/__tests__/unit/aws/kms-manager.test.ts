import { describe, it, expect, beforeEach } from '@jest/globals';
import { mockClient } from 'aws-sdk-client-mock';
import { KMSClient, ListAliasesCommand } from '@aws-sdk/client-kms';
import { contactFormKeyAlias, findKeyIdByAlias } from '../../../core/aws/kms-manager.js';
import type { DeployContext } from '../../../core/context.js';
import { createTestContext } from '../../helpers/test-context.js';

const kmsMock = mockClient(KMSClient);

describe('KMS key lookup', () => {
  let context: DeployContext;

  beforeEach(() => {
    kmsMock.reset();
    context = createTestContext();
  });

  it('should name the contact form alias after the prefix', () => {
    expect(contactFormKeyAlias('example-org')).toBe('alias/example-org-contact-form');
  });

  it('should return the key behind the alias', async () => {
    kmsMock.on(ListAliasesCommand).resolves({
      Aliases: [
        { AliasName: 'alias/aws/s3', TargetKeyId: 'aws-managed' },
        { AliasName: 'alias/example-org-contact-form', TargetKeyId: 'key-1234' },
      ],
    });

    await expect(findKeyIdByAlias(context, 'alias/example-org-contact-form')).resolves.toBe('key-1234');
  });

  it('should accept an alias without the alias/ prefix', async () => {
    kmsMock.on(ListAliasesCommand).resolves({
      Aliases: [{ AliasName: 'alias/example-org-contact-form', TargetKeyId: 'key-1234' }],
    });

    await expect(findKeyIdByAlias(context, 'example-org-contact-form')).resolves.toBe('key-1234');
  });

  it('should page through aliases with the marker', async () => {
    kmsMock
      .on(ListAliasesCommand)
      .resolvesOnce({
        Aliases: [{ AliasName: 'alias/other', TargetKeyId: 'key-other' }],
        Truncated: true,
        NextMarker: 'marker-2',
      })
      .resolvesOnce({
        Aliases: [{ AliasName: 'alias/example-org-contact-form', TargetKeyId: 'key-1234' }],
        Truncated: false,
      });

    await expect(findKeyIdByAlias(context, 'alias/example-org-contact-form')).resolves.toBe('key-1234');
    expect(kmsMock.commandCalls(ListAliasesCommand)[1].args[0].input.Marker).toBe('marker-2');
  });

  it('should return null when the alias does not exist', async () => {
    kmsMock.on(ListAliasesCommand).resolves({ Aliases: [], Truncated: false });

    await expect(findKeyIdByAlias(context, 'alias/example-org-contact-form')).resolves.toBeNull();
  });
});
