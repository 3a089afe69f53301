/**
 * Environment Detection
 *
 * Used by the logger to pick between compact console lines and JSON entries.
 */

/**
 * CI environment variable names to check.
 */
const CI_ENV_VARS = [
    'CI',
    'CONTINUOUS_INTEGRATION',
    'GITHUB_ACTIONS',
    'GITLAB_CI',
    'CIRCLECI',
    'BUILDKITE',
    'CODEBUILD_BUILD_ID',
    'AWS_LAMBDA_FUNCTION_NAME',
];

/**
 * Detect if running in a CI/headless environment.
 *
 * Checks for:
 * - NETLITE_HEADLESS=true environment variable
 * - Common CI and serverless environment variables
 * - No TTY available
 *
 * @example
 * ```typescript
 * if (isCi()) {
 *     // Log compact lines to stdout instead of JSON to a file
 * }
 * ```
 */
export function isCi(): boolean {

    if (process.env['NETLITE_HEADLESS'] === 'true') {

        return true;

    }

    for (const envVar of CI_ENV_VARS) {

        if (process.env[envVar]) {

            return true;

        }

    }

    // Piped output, non-interactive
    if (!process.stdout.isTTY) {

        return true;

    }

    return false;

}

/**
 * Check if debug logging is enabled.
 *
 * @returns true if NETLITE_DEBUG is set
 */
export function isDebug(): boolean {

    return process.env['NETLITE_DEBUG'] === 'true' || process.env['NETLITE_DEBUG'] === '1';

}
