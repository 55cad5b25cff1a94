import { promises as fs } from "fs";
import path from "path";
import type { RowDataPacket } from "mysql2/promise";
import { createDatabase, type Database } from "@/shared/config/database";
import { logger } from "@/shared/config/logger";

interface MigrationRow extends RowDataPacket {
  id: number;
  filename: string;
  executed_at: Date;
}

export const MIGRATIONS_PATH = path.resolve(__dirname, "../database/migrations");

// Statements are separated by semicolons; `--` comment lines are dropped
export const splitStatements = (sqlContent: string): string[] => {
  return sqlContent
    .split("\n")
    .filter((line) => !line.trim().startsWith("--"))
    .join("\n")
    .split(";")
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
};

export class MigrationRunner {
  private tableName = "migrations";

  constructor(
    private readonly db: Database,
    private readonly migrationsPath: string = MIGRATIONS_PATH
  ) {}

  async run(): Promise<string[]> {
    logger.info("Starting database migrations...");

    await this.createMigrationsTable();

    const pendingMigrations = await this.getPendingMigrations();

    if (pendingMigrations.length === 0) {
      logger.info("No pending migrations found");
      return [];
    }

    logger.info(`Found ${pendingMigrations.length} pending migrations`);

    for (const migrationFile of pendingMigrations) {
      await this.executeMigration(migrationFile);
    }

    logger.info("All migrations completed successfully");
    return pendingMigrations;
  }

  async status(): Promise<void> {
    await this.createMigrationsTable();

    const migrationFiles = await this.getMigrationFiles();
    const pendingMigrations = await this.getPendingMigrations();

    logger.info(
      {
        total: migrationFiles.length,
        executed: migrationFiles.length - pendingMigrations.length,
        pending: pendingMigrations,
      },
      "Migration status"
    );
  }

  private async createMigrationsTable(): Promise<void> {
    await this.db.execute(`
      CREATE TABLE IF NOT EXISTS ${this.tableName} (
        id INT AUTO_INCREMENT PRIMARY KEY,
        filename VARCHAR(255) NOT NULL UNIQUE,
        executed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);
    logger.debug("Migrations table ready");
  }

  private async getMigrationFiles(): Promise<string[]> {
    const files = await fs.readdir(this.migrationsPath);
    return files.filter((file) => file.endsWith(".sql")).sort();
  }

  private async getPendingMigrations(): Promise<string[]> {
    const migrationFiles = await this.getMigrationFiles();
    const executed = await this.db.query<MigrationRow>(`SELECT id, filename, executed_at FROM ${this.tableName} ORDER BY id`);
    const executedNames = new Set(executed.map((migration) => migration.filename));

    return migrationFiles.filter((file) => !executedNames.has(file));
  }

  private async executeMigration(filename: string): Promise<void> {
    logger.info(`Executing migration: ${filename}`);

    const sqlContent = await fs.readFile(path.join(this.migrationsPath, filename), "utf-8");
    const statements = splitStatements(sqlContent);

    // MySQL commits DDL implicitly; the transaction covers the bookkeeping insert
    await this.db.transaction(async (tx) => {
      for (const statement of statements) {
        await tx.execute(statement);
      }

      await tx.execute(`INSERT INTO ${this.tableName} (filename) VALUES (?)`, [filename]);
    });

    logger.info(`Migration completed: ${filename}`);
  }
}

// CLI handling
async function main(): Promise<void> {
  const command = process.argv[2] ?? "up";
  const db = createDatabase();
  const migrationRunner = new MigrationRunner(db);

  try {
    switch (command) {
      case "up":
        await migrationRunner.run();
        break;
      case "status":
        await migrationRunner.status();
        break;
      default:
        logger.info("Usage: npm run migrate [up|status]");
        logger.info("  up     - Run pending migrations (default)");
        logger.info("  status - Show migration status");
        break;
    }
  } finally {
    await db.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error({ err: error }, "Migration script failed");
    process.exit(1);
  });
}
