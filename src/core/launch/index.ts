export { RuntimeLauncher, type LaunchContext, type RuntimeLauncherOptions } from './launcher.js';
export { formatEndpoint, type Endpoint, type ProcessHandle } from './process-handle.js';
export { probeTcpPort, waitForHealthy, type HealthCheckOptions, type PortProbe } from './health.js';
export { StaticSiteServer, routeStatic, siteFiles, contentTypeFor } from './static-server.js';
export { launchProcess, type ProcessLaunchOptions } from './process-launcher.js';
export { buildRuntimeConfig } from './runtime-config.js';
