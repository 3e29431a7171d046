/**
 * Validate Command Handler
 *
 * Validates a YAML configuration file against the schema without
 * requiring vmrun. Missing template files are reported as warnings.
 */

import { resolve } from 'node:path';
import { access, constants } from 'node:fs/promises';

import { loadYamlFile } from '../../config/loader.js';
import { validateConfig } from '../../config/validator.js';
import { resolveConfig } from '../../config/resolver.js';
import type { ResolvedConfig } from '../../config/types.js';
import { createOutput, handleError } from '../output.js';

/**
 * Options for the validate command
 */
export interface ValidateCommandOptions {
  json?: boolean;
}

/**
 * Execute the validate command.
 *
 * This command:
 * 1. Loads the YAML configuration file
 * 2. Validates it against the JSON schema
 * 3. Reports validation errors or success
 * 4. Warns about a missing template or storage directory (non-blocking)
 *
 * @param file - Path to the configuration file
 * @param options - Command options
 */
export async function validateCommand(
  file: string,
  options: ValidateCommandOptions
): Promise<void> {
  const output = createOutput('validate', options);

  try {
    const configPath = resolve(file);
    output.info(`Validating configuration: ${file}`);

    const rawConfig = await loadYamlFile(configPath);
    const validationResult = validateConfig(rawConfig);

    if (!validationResult.valid) {
      output.validationError(validationResult.errors);
      output.flush();
      process.exit(1);
    }

    const config = resolveConfig(validationResult.config, configPath);
    const warnings = await checkHostPaths(config);

    output.validationSuccess(config);

    if (warnings.length > 0) {
      output.newline();
      for (const warning of warnings) {
        output.warning(warning);
      }
    }
    output.setData('warnings', warnings);

    output.flush();
    process.exit(0);

  } catch (error) {
    handleError(output, error);
  }
}

/**
 * Report host paths from the configuration that do not exist here.
 */
async function checkHostPaths(config: ResolvedConfig): Promise<string[]> {
  const warnings: string[] = [];
  try {
    await access(config.template.vmxPath, constants.R_OK);
  } catch {
    warnings.push(`Template not found: ${config.template.vmxPath}`);
  }
  try {
    await access(config.template.storagePath);
  } catch {
    warnings.push(`Storage directory not found: ${config.template.storagePath}`);
  }
  return warnings;
}
