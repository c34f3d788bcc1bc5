import { parseDocument, stringify } from 'yaml';
import { z } from 'zod';
import { ValidationError } from '../errors.js';

/**
 * Structural schema of a discovery configuration document.
 * Only the shape is checked; parameter semantics are the engine's concern.
 * Unrecognized top-level sections are dropped.
 */
const sectionSchema = z.record(z.string(), z.unknown());

const commonSchema = z
  .object({
    train_log_path: z.string().nullable().optional(),
    test_log_path: z.string().nullable().optional(),
    log_ids: z.record(z.string(), z.string()).optional(),
    evaluation_metrics: z.array(z.string()).optional(),
    num_final_evaluations: z.number().int().positive().optional(),
    perform_final_evaluation: z.boolean().optional(),
    discover_data_attributes: z.boolean().optional(),
    clean_intermediate_files: z.boolean().optional(),
  })
  .passthrough();

const configurationSchema = z.object({
  version: z.number().int().positive().optional(),
  common: commonSchema.optional(),
  preprocessing: sectionSchema.optional(),
  control_flow: sectionSchema.optional(),
  resource_model: sectionSchema.optional(),
  extraneous_activity_delays: sectionSchema.optional(),
});

export type DiscoveryConfiguration = z.infer<typeof configurationSchema>;

/**
 * Parses and structurally validates an uploaded configuration file.
 */
export function parseDiscoveryConfiguration(content: Buffer | string): DiscoveryConfiguration {
  const text = typeof content === 'string' ? content : content.toString('utf-8');
  if (text.trim().length === 0) {
    throw new ValidationError('Configuration file is empty');
  }

  const document = parseDocument(text);
  if (document.errors.length > 0) {
    throw new ValidationError('Configuration file is not valid YAML', {
      errors: document.errors.map((error) => error.message),
    });
  }

  const result = configurationSchema.safeParse(document.toJS());
  if (!result.success) {
    throw new ValidationError('Configuration file does not match the discovery configuration schema', {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }

  return result.data;
}

/**
 * Points the configuration at the stored event log. Separate test logs are not accepted.
 */
export function bindEventLog(
  configuration: DiscoveryConfiguration,
  eventLogPath: string
): DiscoveryConfiguration {
  return {
    ...configuration,
    common: {
      ...(configuration.common ?? {}),
      train_log_path: eventLogPath,
      test_log_path: null,
    },
  };
}

/**
 * Minimal configuration for submissions without one: the engine's defaults apply.
 */
export function defaultDiscoveryConfiguration(eventLogPath: string): DiscoveryConfiguration {
  return bindEventLog({ version: 4 }, eventLogPath);
}

export function serializeDiscoveryConfiguration(configuration: DiscoveryConfiguration): string {
  return stringify(configuration);
}
