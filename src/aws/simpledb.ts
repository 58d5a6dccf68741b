import SimpleDB from 'aws-sdk/clients/simpledb.js';
import { silentLogger } from '../logger.js';
import { paginate } from './paginate.js';
import { AWS_REQUEST_TIMEOUT_MS, DomainNotFoundError } from './types.js';
import type { AwsOptions } from './types.js';

/**
 * The SimpleDB operations used here. A `SimpleDB` client satisfies it.
 */
export interface SimpleDBDomainClient {
  listDomains(params: SimpleDB.ListDomainsRequest): {
    promise(): Promise<SimpleDB.ListDomainsResult>;
  };
  deleteDomain(params: SimpleDB.DeleteDomainRequest): {
    promise(): Promise<unknown>;
  };
}

/**
 * Deletes an existing SimpleDB domain.
 *
 * The domain listing is checked first; nothing is deleted when the domain is
 * missing.
 *
 * @throws {DomainNotFoundError} If no domain with that name exists
 */
export async function deleteSimpleDBDomain(
  domainName: string,
  region: string,
  options: AwsOptions<SimpleDBDomainClient> = {},
): Promise<void> {
  const client: SimpleDBDomainClient = options.client ?? new SimpleDB({
    region,
    httpOptions: { timeout: AWS_REQUEST_TIMEOUT_MS },
  });
  const logger = options.logger ?? silentLogger;

  const pages = paginate(
    (NextToken) => client.listDomains({ NextToken }).promise(),
    (page) => page.NextToken,
  );

  let exists = false;
  for await (const page of pages) {
    if (page.DomainNames?.includes(domainName)) {
      exists = true;
    }
  }
  if (!exists) {
    throw new DomainNotFoundError(domainName);
  }

  logger.debug({ region, domainName }, 'deleting SimpleDB domain');
  await client.deleteDomain({ DomainName: domainName }).promise();
}
