#!/usr/bin/env node
import * as NodeHttpClient from "@effect/platform-node/NodeHttpClient";
import * as NodeRuntime from "@effect/platform-node/NodeRuntime";
import { Cause, Console, Effect, Logger, Option } from "effect";
import { isConfigError } from "effect/ConfigError";
import * as Sentry from "@sentry/node";
import { AppConfig } from "./config.js";
import { parseCliArgs } from "./cli-args.js";
import { serviceLayers } from "./layers.js";
import { SolarAnalysis, type AnalysisError } from "./analysis/types.js";
import { renderFailure, renderReport } from "./presenter/index.js";

const failWith = (error: AnalysisError) =>
  Console.error(renderFailure(error)).pipe(Effect.zipRight(Effect.fail(error)));

const program = Effect.gen(function*() {
  const sentryDsn = yield* AppConfig.sentry.dsn;
  if (Option.isSome(sentryDsn)) {
    Sentry.init({
      dsn: sentryDsn.value,
    });
  }

  const request = yield* parseCliArgs(process.argv.slice(2));
  const analysis = yield* SolarAnalysis;
  const report = yield* analysis.run(request);

  yield* Console.log(renderReport(report));
}).pipe(
  Effect.catchTags({
    InvalidInput: failWith,
    LocationNotFound: failWith,
    WeatherTransport: failWith,
  }),
  Effect.provide(serviceLayers),
  Effect.provide(NodeHttpClient.layer),
);

const main = Effect.gen(function*() {
  const level = yield* AppConfig.logging.level;
  yield* program.pipe(Logger.withMinimumLogLevel(level));
}).pipe(
  Effect.catchIf(isConfigError, (error) =>
    Console.error(`Configuration error: ${String(error)}`).pipe(Effect.zipRight(Effect.fail(error)))
  ),
  Effect.tapDefect((cause) =>
    Effect.logError("Unexpected failure", cause).pipe(
      Effect.zipRight(Effect.promise(() => {
        Sentry.captureException(Cause.squash(cause));
        return Sentry.flush(2000);
      })),
    )
  ),
);

// expected failures are printed above, runMain only sets the exit code
NodeRuntime.runMain(main, { disableErrorReporting: true });
