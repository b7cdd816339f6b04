import pg from 'pg';
import { createLogger } from '../logger.js';

const log = createLogger('Hyper');

export interface HyperConnection {
  query(sql: string): Promise<void>;
  close(): Promise<void>;
}

export type HyperConnector = () => Promise<HyperConnection>;

/**
 * Hyper speaks the PostgreSQL wire protocol, so a running `hyperd` is driven
 * with the plain `pg` client.
 */
export function pgHyperConnector(endpoint: string): HyperConnector {
  return async () => {
    const client = new pg.Client({ connectionString: endpoint });
    await client.connect();
    log.debug({ action: 'hyper.connected' }, 'Connected to Hyper');
    return {
      async query(sql: string): Promise<void> {
        await client.query(sql);
      },
      close(): Promise<void> {
        return client.end();
      },
    };
  };
}
