import type { OutputMode, Report, ReportOutcome, ReportWindow } from '@/types';
import { usageShare } from '../cost/aggregator';
import type { OutputWriter } from '../output/writer';
import { type Colors, renderPanel, renderTable } from './box';
import { formatCurrency, formatPercent } from './format';

export type PresentOptions = {
  mode: OutputMode;
  colors: Colors;
};

export const NO_DATA = 'no data';

export const present = (outcome: ReportOutcome, options: PresentOptions, writer: OutputWriter) => {
  if (options.mode === 'json') {
    presentJson(outcome, writer);
  } else {
    presentHuman(outcome, options.colors, writer);
  }
};

const presentJson = (outcome: ReportOutcome, writer: OutputWriter) => {
  switch (outcome.kind) {
    case 'report':
      writer.json(outcome.report);
      return;
    case 'empty':
      writer.json({ error: NO_DATA });
      return;
    case 'failed':
      writer.json({ error: NO_DATA, detail: outcome.error.message });
      return;
  }
};

const presentHuman = (outcome: ReportOutcome, colors: Colors, writer: OutputWriter) => {
  const write = (lines: string[]) => lines.forEach((l) => writer.line(l));

  if (outcome.kind === 'empty') {
    writer.line(colors.red('No cost data found.'));
    return;
  }
  if (outcome.kind === 'failed') {
    writer.line(colors.red(outcome.error.message));
    return;
  }

  write(servicesOverview(outcome.report, colors));
  writer.line();
  write(
    renderPanel(
      {
        lines: [
          {
            text: 'Detailed Cost Breakdown by Service',
            style: (t) => colors.bold(colors.cyan(t)),
          },
        ],
      },
      colors
    )
  );
  for (const table of usageBreakdowns(outcome.report, colors)) {
    write(table);
    writer.line();
  }
};

/** The period panel; printed ahead of the fetch so it shows while waiting. */
export const presentHeader = (window: ReportWindow, colors: Colors, writer: OutputWriter) => {
  const lines = renderPanel(
    {
      title: 'AWS Cost Explorer',
      lines: [
        { text: 'AWS Cost Analysis', style: (t) => colors.bold(colors.cyan(t)) },
        { text: `Period: ${window.start} to ${window.end}`, style: colors.yellow },
      ],
    },
    colors
  );
  lines.forEach((l) => writer.line(l));
};

const servicesOverview = (report: Report, colors: Colors) =>
  renderTable(
    {
      title: 'Services Overview',
      columns: [
        { header: 'Service', style: colors.cyan },
        { header: 'Cost', align: 'right', style: colors.green },
        { header: '% of Total', align: 'right', style: colors.yellow },
      ],
      rows: report.services.map((s) => [
        s.name,
        formatCurrency(s.cost),
        formatPercent(s.percentage),
      ]),
      footer: [['Total', formatCurrency(report.totalCost), formatPercent(100)]],
    },
    colors
  );

const usageBreakdowns = (report: Report, colors: Colors) =>
  report.services.map((s) =>
    renderTable(
      {
        title: `${s.name} Usage Types`,
        columns: [
          { header: 'Usage Type', style: colors.cyan },
          { header: 'Cost', align: 'right', style: colors.green },
          { header: '% of Service', align: 'right', style: colors.yellow },
        ],
        rows: s.usageTypes.map((u) => [
          u.name,
          formatCurrency(u.cost),
          formatPercent(usageShare(u.cost, s.cost)),
        ]),
      },
      colors
    )
  );
