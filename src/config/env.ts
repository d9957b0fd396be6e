import { getEnvFlag, getEnvInt, getEnvVar } from '../utils/envHelper';
import type { PipelineSettings } from '../utils/mutationPipeline';
import {
  DEFAULT_DIRECTIVE_HEADER_NAME,
  DEFAULT_GRPC_PORT,
  DEFAULT_HEALTH_PORT,
  DEFAULT_IGNORE_URLS_FOR_LOGGING_BY_PREFIX,
  DEFAULT_LISTEN_HOST,
  DEFAULT_PROCESSOR_SERVICE_NAME,
  DEFAULT_SHUTDOWN_DRAIN_TIMEOUT_MS,
  DEFAULT_STAMP_HEADER_NAME,
  DEFAULT_STAMP_HEADER_VALUE,
  DEFAULT_STRIP_DIRECTIVE_HEADER,
} from './defaultEnv';
// Centralized environment variable initialization
export const GRPC_PORT = getEnvInt('GRPC_PORT', DEFAULT_GRPC_PORT);
export const HEALTH_PORT = getEnvInt('HEALTH_PORT', DEFAULT_HEALTH_PORT);
export const LISTEN_HOST = getEnvVar('LISTEN_HOST', DEFAULT_LISTEN_HOST);
export const PROCESSOR_SERVICE_NAME = getEnvVar('PROCESSOR_SERVICE_NAME', DEFAULT_PROCESSOR_SERVICE_NAME);
export const SHUTDOWN_DRAIN_TIMEOUT_MS = getEnvInt('SHUTDOWN_DRAIN_TIMEOUT_MS', DEFAULT_SHUTDOWN_DRAIN_TIMEOUT_MS);
export const IGNORE_URLS_FOR_LOGGING_BY_PREFIX = getEnvVar('IGNORE_URLS_FOR_LOGGING_BY_PREFIX', DEFAULT_IGNORE_URLS_FOR_LOGGING_BY_PREFIX);

export const PIPELINE_SETTINGS: PipelineSettings = {
  stampHeader: {
    key: getEnvVar('STAMP_HEADER_NAME', DEFAULT_STAMP_HEADER_NAME),
    value: getEnvVar('STAMP_HEADER_VALUE', DEFAULT_STAMP_HEADER_VALUE),
  },
  directiveHeaderName: getEnvVar('DIRECTIVE_HEADER_NAME', DEFAULT_DIRECTIVE_HEADER_NAME),
  stripDirectiveHeader: getEnvFlag('STRIP_DIRECTIVE_HEADER', DEFAULT_STRIP_DIRECTIVE_HEADER),
};
