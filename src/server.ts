import { createServer, type Server as HttpServer } from "http";
import { config } from "./shared/config/environment";
import { logger } from "./shared/config/logger";
import { createDatabase, type Database } from "./shared/config/database";
import App from "./app";
import { createRepositories } from "./container";

class Server {
  private app: App;
  private httpServer: HttpServer;
  private isShuttingDown = false;

  constructor(private readonly db: Database) {
    this.app = new App({ db, repositories: createRepositories(db) });
    this.httpServer = createServer(this.app.getApp());

    this.setupGracefulShutdown();
  }

  public async start(): Promise<void> {
    // Fail fast when the database is unreachable
    await this.db.ping();
    logger.info({ host: config.database.host, database: config.database.name }, "Database connection established");

    // Set up server error handling
    this.httpServer.on("error", (error: NodeJS.ErrnoException) => {
      if (error.syscall !== "listen") {
        throw error;
      }

      switch (error.code) {
        case "EACCES":
          logger.error(`Port ${config.app.port} requires elevated privileges`);
          process.exit(1);
          break;
        case "EADDRINUSE":
          logger.error(`Port ${config.app.port} is already in use`);
          process.exit(1);
          break;
        default:
          throw error;
      }
    });

    // Start the HTTP server
    this.httpServer.listen(config.app.port, () => {
      logger.info(
        {
          name: config.app.name,
          port: config.app.port,
          environment: config.app.env,
          nodeVersion: process.version,
        },
        "Server started successfully"
      );

      if (config.app.isDevelopment) {
        logger.info(`API Base URL: http://localhost:${config.app.port}/api/${config.app.apiVersion}`);
        if (config.swagger.enabled) {
          logger.info(`API Documentation: http://localhost:${config.app.port}/docs`);
        }
      }
    });
  }

  private setupGracefulShutdown(): void {
    const shutdown = (signal: string, exitCode: number = 0): void => {
      if (this.isShuttingDown) return;
      this.isShuttingDown = true;

      logger.info(`Received ${signal}. Starting graceful shutdown...`);

      // Force shutdown after 30 seconds
      const forceExit = setTimeout(() => {
        logger.error("Graceful shutdown timeout, forcing exit");
        process.exit(1);
      }, 30000);
      forceExit.unref();

      // Stop accepting new requests
      this.httpServer.close(() => {
        logger.info("HTTP server closed");

        this.db
          .close()
          .then(() => {
            logger.info("Graceful shutdown completed");
            process.exit(exitCode);
          })
          .catch((error: unknown) => {
            logger.error({ err: error }, "Error during graceful shutdown");
            process.exit(1);
          });
      });
    };

    // Handle process termination signals
    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));

    // Handle uncaught exceptions
    process.on("uncaughtException", (error) => {
      logger.fatal({ err: error }, "Uncaught Exception");
      shutdown("uncaughtException", 1);
    });

    // Handle unhandled promise rejections
    process.on("unhandledRejection", (reason) => {
      logger.fatal({ err: reason }, "Unhandled Rejection");
      shutdown("unhandledRejection", 1);
    });
  }
}

// Start the server if this file is executed directly
if (require.main === module) {
  const db = createDatabase();
  const server = new Server(db);

  server.start().catch((error: unknown) => {
    logger.fatal({ err: error }, "Failed to start application");
    db.close()
      .catch((closeError: unknown) => logger.error({ err: closeError }, "Error closing database pool"))
      .finally(() => process.exit(1));
  });
}

export default Server;
