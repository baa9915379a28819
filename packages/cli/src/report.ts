import type { ValueSummary } from '@marketsim/core';
import type { IntervalReport, SimulationEngine, SimulationResult } from '@marketsim/agent';
import { renderValueChart } from './plot.js';

/** Line sink for reports. Defaults to console.log. */
export type LineWriter = (line: string) => void;

function money(value: number): string {
  return value.toFixed(2);
}

/**
 * Format the statistics block for one group of agents.
 *
 * @param name - Group label, e.g. "Active Participants".
 * @param summary - Summary produced by summarizeValues().
 * @returns Report lines without trailing newlines.
 */
export function formatGroupReport(name: string, summary: ValueSummary): string[] {
  if (summary.kind === 'noData') {
    return [`--- ${name} Report (0 people) ---`, 'No data to show.'];
  }
  return [
    `--- ${name} Report (${String(summary.count)} people) ---`,
    `Mean: ${money(summary.mean)}`,
    `Median: ${money(summary.median)}`,
    summary.mode.kind === 'mode' ? `Mode: ${money(summary.mode.value)}` : 'Mode: No unique mode',
    `Min: ${money(summary.min)}`,
    `Max: ${money(summary.max)}`,
  ];
}

/**
 * List the market states an interval went through, one line per period.
 *
 * @param report - Interval report from the engine.
 * @returns "Year N: STATE" lines under a heading.
 */
export function formatMarketUpdate(report: IntervalReport): string[] {
  return [
    'Market update for this interval:',
    ...report.states.map((state, i) => `Year ${String(report.startPeriod + i)}: ${state.toUpperCase()}`),
  ];
}

/**
 * Message printed when a requested interval was shortened to fit the horizon.
 *
 * @param simulatedPeriods - Periods actually run.
 * @param horizon - Total periods in the run.
 */
export function formatAdjustment(simulatedPeriods: number, horizon: number): string {
  return `Adjusting to ${String(simulatedPeriods)} year(s) to stay within ${String(horizon)}-year limit.`;
}

/**
 * Format everything printed after an interval.
 *
 * @param report - Interval report from the engine.
 * @param horizon - Total periods in the run.
 * @returns Lines, blank lines included.
 */
export function formatIntervalReport(report: IntervalReport, horizon: number): string[] {
  return [
    ...(report.adjusted ? [formatAdjustment(report.simulatedPeriods, horizon)] : []),
    '',
    ...formatMarketUpdate(report),
    '',
    ...formatGroupReport('Active Participants', report.active),
    '',
    ...formatGroupReport('Exited Participants', report.inactive),
  ];
}

/**
 * Format the final summary and the value chart.
 *
 * @param result - Result returned by finish().
 * @returns Lines, blank lines included.
 */
export function formatFinalSummary(result: SimulationResult): string[] {
  return [
    '',
    '',
    '==== FINAL SUMMARY ====',
    '',
    ...formatGroupReport('Active Participants', result.active),
    '',
    ...formatGroupReport('Exited Participants', result.inactive),
    '',
    ...renderValueChart(result.valueSeries),
  ];
}

/**
 * Print interval reports and the final summary as the engine emits them.
 *
 * @param engine - Engine to listen to.
 * @param write - Line sink.
 * @returns A function that detaches the listeners.
 */
export function attachReporter(engine: SimulationEngine, write: LineWriter = console.log): () => void {
  const onInterval = (report: IntervalReport): void => {
    for (const line of formatIntervalReport(report, engine.horizon)) write(line);
  };
  const onComplete = (result: SimulationResult): void => {
    for (const line of formatFinalSummary(result)) write(line);
  };

  engine.on('interval', onInterval);
  engine.on('complete', onComplete);

  return () => {
    engine.off('interval', onInterval);
    engine.off('complete', onComplete);
  };
}
