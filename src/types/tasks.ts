import { SearchFilter, StandardRecord } from './standard';

export type CrawlTaskStatus = 'running' | 'completed' | 'failed';

export type CrawlTaskMode = 'single' | 'batch';

export type ExportFormat = 'json' | 'csv';

export interface CrawlTaskParams {
  keywords: string[];
  maxPages: number;
  filter: SearchFilter;
  fetchDetails: boolean;
}

export interface CrawlTaskRecord extends CrawlTaskParams {
  taskId: string;
  mode: CrawlTaskMode;
  status: CrawlTaskStatus;
  progress: number;
  message: string;
  results: StandardRecord[];
  total: number;
  createdAt: string;
  finishedAt?: string;
  errorMessage?: string;
  file?: string;
}

export type CrawlTaskSnapshot = Omit<CrawlTaskRecord, 'results'>;

export interface CrawlResultsPage {
  taskId: string;
  status: CrawlTaskStatus;
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
  results: StandardRecord[];
}

export interface CrawlHistoryEntry {
  taskId: string;
  keyword: string;
  keywords: string[];
  status: CrawlTaskStatus;
  total: number;
  createdAt: string;
}

export interface ExportPayload {
  filename: string;
  contentType: string;
  content: string;
}

export interface CrawlProgressEvent {
  keyword: string;
  keywordIndex: number;
  keywordCount: number;
  message: string;
}

export type CrawlProgressCallback = (event: CrawlProgressEvent) => void;
