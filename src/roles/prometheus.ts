import { stringify } from 'yaml';

export const SCRAPE_JOB = 'platform';

/** prometheus.yml scraping every monitoring target under one job. */
export function renderPrometheusConfig(targets: readonly string[], scrapeInterval = '15s'): string {
  const doc = {
    global: {
      scrape_interval: scrapeInterval,
      evaluation_interval: scrapeInterval,
    },
    scrape_configs: [
      {
        job_name: SCRAPE_JOB,
        static_configs: [{ targets: [...targets] }],
      },
    ],
  };
  return stringify(doc, { lineWidth: 0 });
}
