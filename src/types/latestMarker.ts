export interface LatestMarker {
  dt: string;
  run_id: string;
}
