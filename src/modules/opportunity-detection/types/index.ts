export type { ScanResult } from './scan-result.type';
