import express, { type Application, type Request, type Response, type NextFunction } from "express";
import cors from "cors";
import helmet from "helmet";
import compression from "compression";
import morgan from "morgan";
import swaggerUi from "swagger-ui-express";
import { config } from "./shared/config/environment";
import { logger, logRequest } from "./shared/config/logger";
import type { Database } from "./shared/config/database";
import type { ApiResponse } from "./shared/types/common.types";
import { errorHandler, notFoundHandler } from "./shared/middleware/error.middleware";
import { generateCorrelationId } from "./shared/utils/crypto";
import { createApiRouter } from "./api/v1/routes";
import { createSwaggerSpec } from "./api/swagger/swagger.config";
import { createContainer, type Repositories } from "./container";

export interface AppDependencies {
  db: Pick<Database, "ping">;
  repositories: Repositories;
}

class App {
  public app: Application;

  constructor(private readonly deps: AppDependencies) {
    this.app = express();
    this.initializeMiddleware();
    this.initializeSwagger();
    this.initializeRoutes();
    this.initializeErrorHandling();
  }

  private initializeMiddleware(): void {
    // Trust proxy headers (for proper IP detection behind a reverse proxy eg. Nginx)
    this.app.set("trust proxy", 1);

    // Security middleware
    this.app.use(
      helmet({
        contentSecurityPolicy: config.swagger.enabled ? false : undefined,
      })
    );

    // CORS configuration
    this.app.use(
      cors({
        origin: (origin, callback) => {
          // Allow requests with no origin (curl, server-to-server)
          if (!origin) return callback(null, true);

          if (config.cors.origins.includes(origin)) {
            return callback(null, true);
          }

          // In development, allow localhost with any port
          if (config.app.isDevelopment && origin.includes("localhost")) {
            return callback(null, true);
          }

          return callback(new Error("Not allowed by CORS"), false);
        },
        credentials: true,
        methods: ["GET", "POST", "DELETE", "PATCH", "OPTIONS"],
        allowedHeaders: ["Origin", "Content-Type", "Accept", "Authorization", "X-Correlation-ID"],
        exposedHeaders: ["X-Correlation-ID"],
      })
    );

    // Compression middleware
    this.app.use(compression());

    // Body parsing middleware
    this.app.use(express.json({ limit: "1mb" }));

    // Request correlation ID middleware
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const header = req.get("X-Correlation-ID");
      const correlationId = header && header.length <= 128 ? header : generateCorrelationId();

      req.correlationId = correlationId;
      res.setHeader("X-Correlation-ID", correlationId);
      next();
    });

    // Request logging middleware
    if (config.app.isDevelopment) {
      this.app.use(morgan("dev"));
    } else if (!config.app.isTest) {
      this.app.use(
        morgan("combined", {
          stream: {
            write: (message: string) => logger.info(message.trim()),
          },
        })
      );
    }

    // Custom request logging
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      logRequest(req, res);
      next();
    });
  }

  private initializeSwagger(): void {
    if (!config.swagger.enabled) return;

    const swaggerSpec = createSwaggerSpec();

    this.app.get("/docs/swagger.json", (_req: Request, res: Response) => {
      res.json(swaggerSpec);
    });

    this.app.use(
      "/docs",
      swaggerUi.serve,
      swaggerUi.setup(swaggerSpec, {
        explorer: true,
        customCss: ".swagger-ui .topbar { display: none }",
        customSiteTitle: `${config.app.name} - API Documentation`,
        swaggerOptions: {
          docExpansion: "none",
          filter: true,
          showRequestDuration: true,
        },
      })
    );

    logger.info("Swagger documentation available at /docs");
  }

  private initializeRoutes(): void {
    // Health check endpoint
    this.app.get("/health", async (_req: Request, res: Response) => {
      let database: "up" | "down" = "up";

      try {
        await this.deps.db.ping();
      } catch (error) {
        database = "down";
        logger.error({ err: error }, "Health check database ping failed");
      }

      const healthCheck: ApiResponse = {
        success: database === "up",
        data: {
          service: config.app.name,
          version: config.app.version,
          environment: config.app.env,
          timestamp: new Date(),
          uptime: process.uptime(),
          database,
        },
        message: database === "up" ? "Service is healthy" : "Database unavailable",
        ...(database === "down" && { code: "INTERNAL_ERROR" }),
      };

      res.status(database === "up" ? 200 : 503).json(healthCheck);
    });

    // API version routing
    this.app.use(`/api/${config.app.apiVersion}`, createApiRouter(createContainer(this.deps.repositories)));
  }

  private initializeErrorHandling(): void {
    // 404 handler (should be before error handler)
    this.app.use(notFoundHandler);

    // Global error handler
    this.app.use(errorHandler);
  }

  public getApp(): Application {
    return this.app;
  }
}

export default App;
