export interface ManualRecord {
  content: string;
  section: string;
  page: number;
  contentType?: string;
  hasCriticalVisual: boolean;
  /** Base64 PNG of the chart, map or table the record depends on. */
  visualContent?: string;
  visualDescription?: string;
  distance?: number;
}

export interface VectorSearchPort {
  searchNear(query: string, limit: number): Promise<ManualRecord[]>;
  fetchPage(page: number, limit: number): Promise<ManualRecord[]>;
  isReady(): Promise<boolean>;
  close(): Promise<void>;
}
