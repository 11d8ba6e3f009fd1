export interface BambooHrConfig {
  apiKey: string;
  /** Company subdomain in `https://<subdomain>.bamboohr.com`. */
  subdomain: string;
  /** Overrides the API root; used by tests. */
  baseUrl?: string;
}

/** Entry of `GET /time_off/whos_out`. Company holidays come back without an employee id. */
export interface WhosOutEntry {
  type: 'timeOff' | 'holiday';
  employeeId?: string;
  name: string;
  start: string;
  end: string;
}
