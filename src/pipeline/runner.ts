import { RangePolicy, TournamentDefinition } from '../core/types';
import { CONFIG } from '../config';
import { loadTournament } from '../data/loader';
import { bindDefinition } from '../bracket/fixture-binding';
import { runAuto, SimulationRun } from '../engine/simulator';
import { eventBus, ModelRangeWarningPayload } from '../events/event-bus';
import { saveRun } from '../storage/database';
import { generateReport } from '../output/report-generator';
import { renderReport } from '../output/cli-renderer';
import { exportReportToJson } from '../output/json-exporter';
import { OutputReport } from '../output/types';

export interface PipelineOptions {
  /** Tournament file name under the tournaments directory. */
  tournament?: string;
  /** Inline definition; takes precedence over `tournament`. */
  definition?: TournamentDefinition;
  trials?: number;
  seed?: number;
  scalingFactor?: number;
  rangePolicy?: RangePolicy;
  exportJson?: boolean;
  save?: boolean;
  silent?: boolean;
}

export interface PipelineResult {
  run: SimulationRun;
  report: OutputReport;
  tournamentName: string;
  exportPath: string | null;
}

/**
 * Run the full pipeline:
 * 1. Load the tournament definition
 * 2. Build and bind the bracket
 * 3. Run the Monte Carlo simulation
 * 4. Store results
 * 5. Generate and display report
 */
export async function runSimulation(options: PipelineOptions = {}): Promise<PipelineResult> {
  const log = (message: string) => {
    if (!options.silent) console.log(message);
  };

  const definition = options.definition ?? loadTournament(options.tournament ?? CONFIG.DEFAULT_TOURNAMENT);
  log(`Loaded ${definition.name}: ${definition.players.length} players, ${definition.fixture.length} first-round matches.`);

  const tournament = bindDefinition(definition);
  const trials = options.trials ?? CONFIG.DEFAULT_TRIALS;

  const onWarning = ({ warning }: ModelRangeWarningPayload) => {
    if (!options.silent) {
      console.warn(
        `Warning: frame probability ${warning.rawProbability.toFixed(4)} for ${warning.player1} vs ${warning.player2} ` +
        `(round ${warning.round}) is outside [0, 1]; ${warning.occurrences} matches affected.`,
      );
    }
  };

  log(`Running ${trials.toLocaleString()} simulations...`);
  eventBus.on('model-range-warning', onWarning);
  let run: SimulationRun;
  try {
    run = await runAuto(tournament, {
      trials,
      seed: options.seed,
      scalingFactor: options.scalingFactor,
      rangePolicy: options.rangePolicy,
      tournamentName: definition.name,
    });
  } finally {
    eventBus.off('model-range-warning', onWarning);
  }
  log(`Completed in ${(run.durationMs / 1000).toFixed(2)}s${run.parallel ? ' on the worker pool' : ''}.`);

  if (options.save) {
    saveRun(run.runId, definition.name, run.result);
    log(`Saved run ${run.runId}.`);
  }

  const report = generateReport(run.result, definition.name);
  log('\n' + renderReport(report));

  let exportPath: string | null = null;
  if (options.exportJson) {
    exportPath = exportReportToJson(report, `${run.runId}.json`);
    log(`Report exported to: ${exportPath}`);
  }

  return { run, report, tournamentName: definition.name, exportPath };
}
