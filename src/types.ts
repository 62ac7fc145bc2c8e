export interface RuntimeMetrics {
  uptimeSeconds: number;
  processPid: number;
  wsClients: number;
}
