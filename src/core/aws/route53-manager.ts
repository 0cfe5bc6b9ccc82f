/**
 * Route53 Manager
 * Resolves the hosted zone of the site domain and publishes ACM validation records
 */

import {
  ListHostedZonesCommand,
  ChangeResourceRecordSetsCommand,
  type HostedZone as Route53HostedZone,
  type Change,
  ChangeAction,
  RRType,
} from "@aws-sdk/client-route-53";
import type { DeployContext } from "../context.js";
import { ConfigError, ZoneNotFoundError } from "../errors.js";
import { isLabelSuffix, isValidDomainName, normalizeDomain, toFqdn } from "../utils/dns.js";
import { AWS_RETRYABLE_ERRORS, withRetry } from "../utils/retry.js";
import { startSpinner } from "../utils/spinner.js";
import type { HostedZone, ValidationRecord } from "../../types/deployment.js";

const VALIDATION_RECORD_TTL = 300;

const RECORD_TYPES: ReadonlySet<string> = new Set(Object.values(RRType));

function isRecordType(value: string): value is RRType {
  return RECORD_TYPES.has(value);
}

/**
 * Route53 Manager for DNS operations
 */
export class Route53Manager {
  constructor(private readonly context: DeployContext) {}

  /**
   * List every hosted zone of the account (all pages)
   */
  async listHostedZones(): Promise<Route53HostedZone[]> {
    const zones: Route53HostedZone[] = [];
    let marker: string | undefined;

    do {
      const response = await this.context.clients.route53.send(
        new ListHostedZonesCommand({ Marker: marker })
      );
      zones.push(...(response.HostedZones ?? []));
      marker = response.IsTruncated ? response.NextMarker : undefined;
    } while (marker);

    return zones;
  }

  /**
   * Find the public hosted zone that owns a domain.
   * Supports apex domains (example.org) and sites under a parent zone
   * (blog.example.org → example.org); the longest matching zone wins.
   *
   * @throws ZoneNotFoundError when no zone name is a suffix of the domain
   */
  async resolve(domainName: string): Promise<HostedZone> {
    if (!isValidDomainName(domainName)) {
      throw new ConfigError(`Invalid domain name: "${domainName}"`);
    }

    const domain = normalizeDomain(domainName);
    const spinner = startSpinner(`Looking up hosted zone for ${domain}...`, this.context.showProgress);

    let zones: Route53HostedZone[];
    try {
      zones = await this.listHostedZones();
    } catch (error) {
      spinner.fail("Failed to list hosted zones");
      throw error;
    }

    let best: HostedZone | null = null;

    for (const zone of zones) {
      if (!zone.Id || !zone.Name || zone.Config?.PrivateZone) {
        continue;
      }

      const zoneName = normalizeDomain(zone.Name);
      if (!isLabelSuffix(zoneName, domain)) {
        continue;
      }

      if (!best || zoneName.length > best.domainName.length) {
        best = { zoneId: this.extractHostedZoneId(zone.Id), domainName: zoneName };
      }
    }

    if (!best) {
      spinner.fail(`No hosted zone found for ${domain}`);
      throw new ZoneNotFoundError(domain);
    }

    spinner.succeed(`Hosted zone ${best.domainName} (${best.zoneId})`);
    return best;
  }

  /**
   * UPSERT ACM validation records into the zone in one change batch.
   * Re-running with the same records leaves the zone unchanged.
   */
  async upsertValidationRecords(
    hostedZoneId: string,
    validationRecords: ValidationRecord[]
  ): Promise<void> {
    if (validationRecords.length === 0) {
      throw new Error("No validation records provided");
    }

    const unique = new Map<string, ValidationRecord>();
    for (const record of validationRecords) {
      unique.set(`${record.recordName}|${record.recordType}|${record.recordValue}`, record);
    }

    const changes: Change[] = [...unique.values()].map((record) => {
      if (!isRecordType(record.recordType)) {
        throw new Error(`Unsupported validation record type: ${record.recordType}`);
      }

      return {
        Action: ChangeAction.UPSERT,
        ResourceRecordSet: {
          Name: toFqdn(record.recordName),
          Type: record.recordType,
          TTL: VALIDATION_RECORD_TTL,
          ResourceRecords: [{ Value: record.recordValue }],
        },
      };
    });

    const spinner = startSpinner("Creating DNS validation records...", this.context.showProgress);

    try {
      await withRetry(
        () =>
          this.context.clients.route53.send(
            new ChangeResourceRecordSetsCommand({
              HostedZoneId: hostedZoneId,
              ChangeBatch: {
                Comment: "ACM certificate validation records created by cfn-site-deploy",
                Changes: changes,
              },
            })
          ),
        {
          retryableErrors: [...AWS_RETRYABLE_ERRORS.Route53, ...AWS_RETRYABLE_ERRORS.General],
          clock: this.context.clock,
          signal: this.context.signal,
        }
      );

      spinner.succeed(`Upserted ${changes.length} DNS validation record(s)`);
    } catch (error) {
      spinner.fail("Failed to create DNS validation records");
      throw new Error(
        `DNS record creation failed: ${
          error instanceof Error ? error.message : "Unknown error"
        }\n\n` +
          "Please check:\n" +
          "  - You have route53:ChangeResourceRecordSets permission\n" +
          "  - The hosted zone ID is correct\n" +
          "  - DNS records are not conflicting with existing records",
        { cause: error }
      );
    }
  }

  /**
   * Get hosted zone ID from zone object
   */
  extractHostedZoneId(hostedZoneId: string): string {
    // Route53 returns IDs like "/hostedzone/Z123456789ABC"
    return hostedZoneId.replace("/hostedzone/", "");
  }
}
