import "reflect-metadata";

import { existsSync } from "node:fs";
import { resolve } from "node:path";
import cors from "@fastify/cors";
import type { FastifyInstance } from "fastify";
import { fastifyTRPCPlugin } from "@trpc/server/adapters/fastify";
import type { FastifyTRPCPluginOptions } from "@trpc/server/adapters/fastify";
import { Logger } from "@nestjs/common";
import type { LogLevel } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { FastifyAdapter, NestFastifyApplication } from "@nestjs/platform-fastify";

import { describeError } from "@pcr-bess/domain";
import { AppModule } from "./app.module";
import { ConfigFileService } from "./config/config-file.service";
import { setRuntimeConfig } from "./config/runtime-config";
import { resolveLogLevels } from "./config/log-levels";
import type { ConfigDocument } from "./config/schemas";
import { SimulationService } from "./simulation/simulation.service";
import { SimulationSeedService } from "./config/simulation-seed.service";
import { TrpcRouter } from "./trpc/trpc.router";
import type { AppRouter } from "./trpc/trpc.router";
import { SimulationConfigFactory } from "./config/simulation-config.factory";

async function bootstrap(): Promise<NestFastifyApplication> {
  const initialConfig = await configureGlobalLogging();
  validateConfigDocument(initialConfig);
  setRuntimeConfig(initialConfig);
  const adapter = new FastifyAdapter({logger: false, maxParamLength: 4096});
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, adapter, {
    bufferLogs: true,
  });

  app.useLogger(new Logger("bootstrap"));
  app.flushLogs();

  const fastify = app.getHttpAdapter().getInstance() as unknown as FastifyInstance;
  await fastify.register(cors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
  });

  const trpcRouter = app.get(TrpcRouter);
  const simulationService = app.get(SimulationService);
  const configSeedService = app.get(SimulationSeedService);
  await fastify.register(fastifyTRPCPlugin, {
    prefix: "/trpc",
    trpcOptions: {
      router: trpcRouter.router,
      createContext: () => ({simulationService}),
      onError: ({path, error}) => trpcRouter.reportError(path, error),
    },
  } satisfies FastifyTRPCPluginOptions<AppRouter>);

  if (process.env.NODE_ENV !== "test" && initialConfig.seed_on_startup !== false) {
    await configSeedService.seedFromConfig();
  }

  const port = Number(process.env.PORT ?? 4000);
  const host = process.env.HOST ?? "0.0.0.0";
  await app.listen(port, host);

  if (process.env.NODE_ENV !== "test") {
    const procedures = trpcRouter.listProcedures().map(({path, type}) => `${type} ${path}`);
    new Logger("pcr-bess").log(`tRPC API listening on ${host}:${port}/trpc (${procedures.join(", ")})`);
  }

  return app;
}

async function configureGlobalLogging(): Promise<ConfigDocument> {
  const bootstrapLogger = new Logger("bootstrap");
  const configFileService = new ConfigFileService();

  let levels: LogLevel[] = ["fatal", "error", "warn", "log"];
  let normalizedLevel = "info";
  let document: ConfigDocument | null = null;

  try {
    const configPath = configFileService.resolvePath();
    document = await configFileService.loadDocument(configPath);

    const rawLevel = document.logging?.level ?? "info";
    const {levels: resolvedLevels, normalized, fallbackUsed} = resolveLogLevels(rawLevel);
    levels = resolvedLevels;
    normalizedLevel = normalized;
    if (fallbackUsed) {
      bootstrapLogger.warn(`Unknown logging.level value '${String(rawLevel)}'; defaulting to INFO`);
    }
  } catch (error) {
    bootstrapLogger.error(`Failed to load configuration for logging: ${describeError(error)}`);
    throw error instanceof Error ? error : new Error(String(error));
  }

  Logger.overrideLogger(levels);
  bootstrapLogger.log(`Logger minimum level set to ${normalizedLevel.toUpperCase()}`);
  return document;
}

function validateConfigDocument(document: ConfigDocument): void {
  const bootstrapLogger = new Logger("bootstrap");
  const factory = new SimulationConfigFactory();

  const parameters = factory.create(document);
  bootstrapLogger.verbose(
    `BESS: ${parameters.capacity_mwh} MWh, ${parameters.prequalified_power_mw} MW prequalified at ${parameters.nominal_frequency_hz} Hz`,
  );

  if (document.dataset) {
    const datasetPath = resolve(process.cwd(), document.dataset.path);
    if (!existsSync(datasetPath)) {
      throw new Error(`dataset.path does not exist: ${datasetPath}`);
    }
  }

  bootstrapLogger.verbose("Configuration validation successful.");
}

if (process.env.NODE_ENV !== "test") {
  bootstrap().catch((error: unknown) => {
    new Logger("bootstrap").fatal(`Startup failed: ${describeError(error)}`);
    process.exitCode = 1;
  });
}

export { bootstrap };
