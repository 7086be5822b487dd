/** A recorded session checkpoint */
export interface HistorySnapshot<T = unknown> {
  timestamp: number;
  label: string;
  data: T;
}
