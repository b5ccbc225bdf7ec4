import {
  Injectable,
  Logger,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, QueryResult, QueryResultRow } from 'pg';

export interface DatabaseHealth {
  ok: boolean;
  now?: string;
  error?: string;
}

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  readonly pool: Pool;

  constructor(private readonly configService: ConfigService) {
    const connectionString = this.configService.get<string>('DATABASE_URL');
    if (!connectionString) {
      throw new Error('DATABASE_URL is not configured');
    }

    this.pool = new Pool({
      connectionString,
      max: Number(this.configService.get<string>('DATABASE_POOL_MAX') || 10),
      statement_timeout: Number(
        this.configService.get<string>('DATABASE_STATEMENT_TIMEOUT_MS') ||
          30000,
      ),
    });

    this.pool.on('error', (error) => {
      this.logger.error(`Idle database client error: ${error.message}`);
    });
  }

  query<T extends QueryResultRow>(
    text: string,
    params: unknown[] = [],
  ): Promise<QueryResult<T>> {
    return this.pool.query<T>(text, params);
  }

  async health(): Promise<DatabaseHealth> {
    try {
      const res = await this.pool.query<{ now: string }>(
        'select now()::text as now',
      );
      return { ok: true, now: res.rows[0]?.now };
    } catch (err) {
      return {
        ok: false,
        error: err instanceof Error ? err.message : String(err),
      };
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
  }
}
