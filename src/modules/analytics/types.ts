export type CountEntry = {
  key: string;
  count: number;
};

export type TopProject = {
  uid: string;
  name: string;
  submissionCount: number;
};

export type AnalyticsOverview = {
  totals: {
    projects: number;
    submissions: number;
    countries: number;
    deployed: number;
  };
  byCountry: CountEntry[];
  topBySubmissions: TopProject[];
  /** Keys are `YYYY-MM`, oldest first. */
  createdPerMonth: CountEntry[];
  bySourceView: CountEntry[];
};
