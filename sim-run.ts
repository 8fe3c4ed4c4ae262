// Headless CFS run over a seeded workload, compared against the baseline algorithms.
// Golden mode records the trace signatures; verify mode replays and compares them.
// Usage: npx tsx sim-run.ts [--seed=N] [--tasks=N] [--latency=N] [--granularity=N] [--quantum=N] [--trace] [--golden|--verify]

import { readFile, writeFile } from "node:fs/promises";
import { GOLDEN_PATH, parseArgs, validateGoldenFile, type GoldenFile, type Params } from "./src/cli/sim_args";
import { BASELINE_ALGORITHMS, runBaseline } from "./src/core/engine/baselines";
import { computeMetrics } from "./src/core/engine/metrics";
import { CfsScheduler } from "./src/core/engine/scheduler";
import { generateWorkload } from "./src/core/engine/workload";
import { formatAggregate, formatMetricsTable, formatTrace } from "./src/core/trace/report";
import { traceSignature } from "./src/core/trace/signature";

const PROGRESS_EVERY = 100;

function runAll(params: Params, showTrace: boolean): Record<string, string> {
  const processes = generateWorkload({ seed: params.seed, count: params.tasks });
  console.log(
    `[SIM] ${processes.length} tasks (seed=${params.seed}) latency=${params.latency} ` +
      `granularity=${params.granularity} quantum=${params.quantum}`
  );

  const scheduler = new CfsScheduler(processes, {
    targetLatency: params.latency,
    minGranularity: params.granularity,
  });
  scheduler.run((v) => {
    if (v.decisions > 0 && v.decisions % PROGRESS_EVERY === 0) {
      console.log(
        `[SIM] decision ${v.decisions} t=${v.now} runnable=${scheduler.runnableCount} ` +
          `pending=${scheduler.pendingCount} done=${scheduler.completedIds().length}`
      );
    }
    return false;
  });
  const events = scheduler.log.drain();

  if (showTrace) for (const line of formatTrace(events)) console.log(line);

  const cfsMetrics = computeMetrics(processes, events);
  console.log("\n[SIM] CFS per-process:");
  for (const line of formatMetricsTable(cfsMetrics.perProcess)) console.log(line);

  const signatures: Record<string, string> = { CFS: traceSignature(events) };
  console.log("");
  console.log(`[SIM] ${formatAggregate("CFS", cfsMetrics.aggregate)} sig=${signatures.CFS}`);

  for (const algo of BASELINE_ALGORITHMS) {
    const slices = runBaseline(algo, processes, params.quantum);
    signatures[algo] = traceSignature(slices);
    const m = computeMetrics(processes, slices);
    console.log(`[SIM] ${formatAggregate(algo, m.aggregate)} sig=${signatures[algo]}`);
  }
  return signatures;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.mode === "verify") {
    const raw = await readFile(GOLDEN_PATH, "utf8").catch(() => null);
    if (raw == null) {
      console.error(`[SIM] missing ${GOLDEN_PATH}. Run: npx tsx sim-run.ts --golden`);
      process.exit(1);
    }
    const golden = validateGoldenFile(JSON.parse(raw));
    // verify always uses the golden params, not CLI defaults
    const actual = runAll(golden, args.trace);
    for (const [algo, expected] of Object.entries(golden.signatures)) {
      const got: string | undefined = actual[algo];
      if (got !== expected) {
        console.error(`[SIM] GOLDEN MISMATCH (${algo}) expected=${expected} actual=${String(got)}`);
        process.exit(1);
      }
    }
    console.log(`[SIM] GOLDEN OK (${Object.keys(golden.signatures).length} traces)`);
    return;
  }

  const signatures = runAll(args, args.trace);

  if (args.mode === "golden") {
    const golden: GoldenFile = {
      seed: args.seed,
      tasks: args.tasks,
      latency: args.latency,
      granularity: args.granularity,
      quantum: args.quantum,
      signatures,
    };
    await writeFile(GOLDEN_PATH, JSON.stringify(golden, null, 2) + "\n", "utf8");
    console.log(`[SIM] WROTE GOLDEN: ${GOLDEN_PATH}`);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
