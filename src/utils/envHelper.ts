import logger from './logger';

/**
 * Returns the value of the given environment variable, or the default if not set.
 * @param envVarName The name of the environment variable.
 */
export function getEnvVar(envVarName: string, defaultVal: string): string {
    const value = process.env[envVarName];
    if (!value) {
        logger.warn(`[ENV Settings] ${envVarName} not set, using default value instead: ${defaultVal}`);
        return defaultVal;
    }
    logger.info(`[ENV Settings] ${envVarName} is set to: ${value}`);
    return value;
}

export function getEnvInt(envVarName: string, defaultVal: number): number {
    const raw = getEnvVar(envVarName, String(defaultVal));
    const parsed = Number.parseInt(raw, 10);
    if (!Number.isInteger(parsed) || parsed < 0) {
        logger.warn(`[ENV Settings] ${envVarName} is not a valid non-negative integer (${raw}), using default value instead: ${defaultVal}`);
        return defaultVal;
    }
    return parsed;
}

export function getEnvFlag(envVarName: string, defaultVal: boolean): boolean {
    const raw = getEnvVar(envVarName, String(defaultVal)).trim().toLowerCase();
    return raw === 'true' || raw === '1' || raw === 'yes';
}
