export interface ConfigTemplateAnswers {
  databasePath: string;
  intervalSeconds?: number;
  showImaginary?: boolean;
}

export const DEFAULT_CONFIG = {
  database: {
    path: '',
    busy_timeout_ms: 250,
  },
  refresh: {
    interval_seconds: 3,
    incremental: true,
  },
  plot: {
    show_imaginary: false,
    heatmap_width: 60,
    max_rows: 40,
  },
};

export function configTemplate(answers: ConfigTemplateAnswers): string {
  return JSON.stringify({
    database: {
      path: answers.databasePath,
      busy_timeout_ms: DEFAULT_CONFIG.database.busy_timeout_ms,
    },
    refresh: {
      interval_seconds: answers.intervalSeconds ?? DEFAULT_CONFIG.refresh.interval_seconds,
      incremental: true,
    },
    plot: {
      show_imaginary: answers.showImaginary ?? false,
      heatmap_width: DEFAULT_CONFIG.plot.heatmap_width,
      max_rows: DEFAULT_CONFIG.plot.max_rows,
    },
  }, null, 2);
}
