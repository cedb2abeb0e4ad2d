/**
 * Reading from inverter.cgi
 */
export interface InverterReading {
  serialNumber: string;
  firmwareVersion: string;
  modelNumber: string;
  /** °C */
  inverterTemperature: number;
  /** W */
  powerCurrent: number;
  /** kWh, rounded to 3 decimals */
  powerToday: number;
  /** kWh; null when the stick reports it as unknown */
  powerTotal: number | null;
  alertsEnabled: boolean | null;
}

/**
 * Network status of the Wi-Fi data-logger stick, from moniter.cgi
 */
export interface DataLoggerStatus {
  serialNumber: string;
  firmwareVersion: string;
  wirelessAp: boolean | null;
  wirelessApSsid: string | null;
  wirelessApIp: string | null;
  wirelessSta: boolean | null;
  wirelessStaSsid: string | null;
  wirelessStaRssi: string | null;
  wirelessStaIp: string | null;
  wirelessStaMac: string | null;
  remoteServerAConnected: boolean | null;
  remoteServerBConnected: boolean | null;
}
