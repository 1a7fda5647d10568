import { OutputReport } from './types';

const WIDTH = 80;

/**
 * Render an odds report to the terminal.
 * Plain text with aligned columns: one probability block and one odds block.
 */
export function renderReport(report: OutputReport): string {
  const lines: string[] = [];
  const divider = '═'.repeat(WIDTH);
  const thinDivider = '─'.repeat(WIDTH);

  // Header
  lines.push(divider);
  lines.push(centerText(report.title, WIDTH));
  lines.push(centerText(`${report.numEntrants} players | best-of ${report.bestOfSchedule.join('/')}`, WIDTH));
  const seedText = report.seed === null ? 'custom rng' : `seed ${report.seed}`;
  lines.push(centerText(`${report.simulationCount.toLocaleString()} simulations | ${seedText} | ${report.generatedAt}`, WIDTH));
  lines.push(divider);
  lines.push('');

  lines.push('  ADVANCEMENT PROBABILITY');
  lines.push(thinDivider);
  lines.push(tableHeader(report, 'E[W]'));
  for (const row of report.rows) {
    lines.push(tableRow(row.rank, row.player, row.rating, row.probabilities, row.expectedWins));
  }
  lines.push('');

  lines.push('  DECIMAL ODDS');
  lines.push(thinDivider);
  lines.push(tableHeader(report, ''));
  for (const row of report.rows) {
    lines.push(tableRow(row.rank, row.player, row.rating, row.odds, ''));
  }
  lines.push('');

  lines.push(`  Stages: ${report.stageShortLabels.map((s, i) => `${s} = ${report.stageLabels[i]}`).join(', ')}`);
  if (report.favourite) {
    lines.push(`  Favourite: ${report.favourite}`);
  }
  for (const warning of report.warnings) {
    lines.push(`  Warning: ${warning}`);
  }
  lines.push('');
  lines.push(divider);

  return lines.join('\n');
}

function tableHeader(report: OutputReport, trailer: string): string {
  return '  ' +
    pad('#', 4) +
    pad('Player', 22) +
    pad('Rating', 8) +
    report.stageShortLabels.map(s => padStart(s, 9)).join('') +
    (trailer ? padStart(trailer, 7) : '');
}

function tableRow(rank: number, player: string, rating: string, cells: string[], trailer: string): string {
  return '  ' +
    pad(String(rank), 4) +
    pad(player, 22) +
    pad(rating, 8) +
    cells.map(c => padStart(c, 9)).join('') +
    (trailer ? padStart(trailer, 7) : '');
}

function pad(str: string, width: number): string {
  return str.length >= width ? str.slice(0, width - 1) + ' ' : str.padEnd(width);
}

function padStart(str: string, width: number): string {
  return str.padStart(width);
}

function centerText(text: string, width: number): string {
  const padding = Math.max(0, Math.floor((width - text.length) / 2));
  return ' '.repeat(padding) + text;
}
