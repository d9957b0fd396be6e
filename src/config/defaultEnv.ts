export const DEFAULT_GRPC_PORT = 9001;
export const DEFAULT_HEALTH_PORT = 8080;
export const DEFAULT_LISTEN_HOST = '0.0.0.0';
export const DEFAULT_SHUTDOWN_DRAIN_TIMEOUT_MS = 5000;
export const DEFAULT_PROCESSOR_SERVICE_NAME = 'envoy.service.ext_proc.v3.ExternalProcessor';
export const DEFAULT_STAMP_HEADER_NAME = 'x-processed-by';
export const DEFAULT_STAMP_HEADER_VALUE = 'extproc-header-sidecar';
export const DEFAULT_DIRECTIVE_HEADER_NAME = 'x-header-instructions';
export const DEFAULT_STRIP_DIRECTIVE_HEADER = true;
export const DEFAULT_IGNORE_URLS_FOR_LOGGING_BY_PREFIX = "['/health']";
