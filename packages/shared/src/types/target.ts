/** Proxy URLs for one target, already resolved against the global defaults */
export interface ProxyConfig {
  /** Used for `http:` status URLs */
  httpProxy?: string;
  /** Used for `https:` status URLs */
  httpsProxy?: string;
}

/** A monitored server status endpoint */
export interface Target {
  /** Section name from the config file; exposed as the `hostname` label */
  label: string;
  /** Status page URL as configured (the `auto` parameter is added at fetch time) */
  url: string;
  proxy: ProxyConfig;
}
