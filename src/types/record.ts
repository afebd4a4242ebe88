export interface NormalizedRecord {
  name: string;
  /** Always carries `url` and `latest_update`; insertion order is the write order */
  data: Map<string, string>;
}

export interface ScenarioMetrics {
  scenario_avg_rating?: number;
  scenario_play_count?: number;
  scenario_avg_duration?: number;
  scenario_avg_win_ratio?: number;
}

/** Package filename (case-sensitive) -> usage metrics */
export type StatsIndex = ReadonlyMap<string, ScenarioMetrics>;

export interface FileInfo {
  timestamp: string;
  filename: string | null;
}
