import { Inject, Injectable, Logger } from "@nestjs/common";
import { initTRPC, TRPCError } from "@trpc/server";
import { z } from "zod";

import type { PcrParameters } from "@pcr-bess/domain";
import { ConfigurationError, describeError, InputShapeError, pcrParametersSchema } from "@pcr-bess/domain";
import { FrequencyDataService } from "../frequency/frequency-data.service";
import { RuntimeConfigService } from "../config/runtime-config.service";
import { SimulationConfigFactory } from "../config/simulation-config.factory";
import { HistoryService } from "../simulation/history.service";
import type { SimulationService } from "../simulation/simulation.service";

export interface TrpcContext {
  simulationService: SimulationService;
}

export interface ProcedureDescriptor {
  path: string;
  type: "query" | "mutation";
}

const PROCEDURES: readonly ProcedureDescriptor[] = [
  {path: "parameters.defaults", type: "query"},
  {path: "simulation.run", type: "mutation"},
  {path: "simulation.runSynthetic", type: "mutation"},
  {path: "simulation.latest", type: "query"},
  {path: "simulation.summary", type: "query"},
  {path: "simulation.distributions", type: "query"},
  {path: "simulation.history", type: "query"},
];

const t = initTRPC.context<TrpcContext>().create();

const parameterOverridesSchema = pcrParametersSchema.partial();

const runInputSchema = z.object({
  label: z.string().min(1).optional(),
  parameters: parameterOverridesSchema.optional(),
  frequency_hz: z.array(z.number()),
  time_s: z.array(z.number()),
});

const syntheticInputSchema = z
  .object({
    label: z.string().min(1).optional(),
    parameters: parameterOverridesSchema.optional(),
    synthetic: z
      .object({
        duration_hours: z.number(),
        sampling_rate_hz: z.number(),
        seed: z.number().int(),
        volatility_hz: z.number(),
        reversion_per_s: z.number(),
        max_deviation_hz: z.number(),
      })
      .partial()
      .optional(),
  })
  .optional();

const runSelectorSchema = z.object({id: z.number().int().positive()}).optional();

const historyInputSchema = z
  .object({
    limit: z.number().int().min(1).max(500).default(20),
  })
  .optional();

/** Domain validation failures are the caller's fault; everything else stays a server error. */
function callerErrors<T>(action: () => T): T {
  try {
    return action();
  } catch (error) {
    if (error instanceof ConfigurationError || error instanceof InputShapeError) {
      throw new TRPCError({code: "BAD_REQUEST", message: error.message, cause: error});
    }
    throw error;
  }
}

function found<T>(value: T | null, what: string): T {
  if (value === null) {
    throw new TRPCError({code: "NOT_FOUND", message: `No ${what} stored yet`});
  }
  return value;
}

export interface RouterDependencies {
  configState: RuntimeConfigService;
  configFactory: SimulationConfigFactory;
  frequencyData: FrequencyDataService;
  historyService: HistoryService;
}

export function createAppRouter(deps: RouterDependencies) {
  const baseParameters = (): PcrParameters => deps.configFactory.create(deps.configState.getDocumentRef());

  return t.router({
    parameters: t.router({
      defaults: t.procedure.query(() => callerErrors(baseParameters)),
    }),
    simulation: t.router({
      run: t.procedure.input(runInputSchema).mutation(({ctx, input}) =>
        callerErrors(() =>
          ctx.simulationService.run({
            label: input.label ?? "api run",
            parameters: deps.configFactory.merge(baseParameters(), input.parameters),
            series: {time_s: input.time_s, frequency_hz: input.frequency_hz},
          }),
        ),
      ),
      runSynthetic: t.procedure.input(syntheticInputSchema).mutation(({ctx, input}) =>
        callerErrors(() => {
          const document = deps.configState.getDocument();
          const parameters = deps.configFactory.merge(baseParameters(), input?.parameters);
          const options = deps.configFactory.createSyntheticOptions(
            {...document, synthetic: {...document.synthetic, ...input?.synthetic}},
            parameters,
          );
          return ctx.simulationService.run({
            label: input?.label ?? `synthetic (seed ${options.seed})`,
            parameters,
            series: deps.frequencyData.synthesize(options),
          });
        }),
      ),
      latest: t.procedure.input(runSelectorSchema).query(({ctx, input}) =>
        found(
          input ? ctx.simulationService.getRun(input.id) : ctx.simulationService.getLatestRun(),
          "simulation run",
        ),
      ),
      summary: t.procedure
        .input(runSelectorSchema)
        .query(({ctx, input}) => found(ctx.simulationService.getSummary(input?.id), "simulation run")),
      distributions: t.procedure
        .input(runSelectorSchema)
        .query(({ctx, input}) => found(ctx.simulationService.getDistributions(input?.id), "simulation run")),
      history: t.procedure
        .input(historyInputSchema)
        .query(({input}) => deps.historyService.getHistory(input?.limit ?? 20)),
    }),
  });
}

export type AppRouter = ReturnType<typeof createAppRouter>;

@Injectable()
export class TrpcRouter {
  private readonly logger = new Logger(TrpcRouter.name);
  readonly router: AppRouter;

  constructor(
    @Inject(RuntimeConfigService) configState: RuntimeConfigService,
    @Inject(SimulationConfigFactory) configFactory: SimulationConfigFactory,
    @Inject(FrequencyDataService) frequencyData: FrequencyDataService,
    @Inject(HistoryService) historyService: HistoryService,
  ) {
    this.router = createAppRouter({configState, configFactory, frequencyData, historyService});
    this.logger.verbose(`tRPC router ready with ${PROCEDURES.length} procedures`);
  }

  listProcedures(): ProcedureDescriptor[] {
    return [...PROCEDURES];
  }

  /** `onError` hook for the fastify adapter. */
  reportError(path: string | undefined, error: unknown): void {
    this.logger.warn(`tRPC ${path ?? "<unknown>"} failed: ${describeError(error)}`);
  }
}
