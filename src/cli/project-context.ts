import { loadConfig, resolveRoot, type Config } from '../config/loader.js';
import type { ProjectOptions } from '../scanner/types.js';
import type { TodoFields } from '../schema/index.js';
import { pickFlag, type FlagMap } from './flag-utils.js';

/** Value flags every project-wide command takes. */
export const PROJECT_VALUE_FLAGS = ['--path', '-p', '--config', '-c'] as const;

export interface ProjectContext {
  root: string;
  config: Config;
}

export function resolveProjectContext(valueFlags: FlagMap): ProjectContext {
  const config = loadConfig(pickFlag(valueFlags, '--config', '-c'));
  return { root: resolveRoot(config, pickFlag(valueFlags, '--path', '-p')), config };
}

export function projectOptions(config: Config): ProjectOptions {
  return { extensions: config.extensions, ignore: config.ignore };
}

export function templateFields(config: Config): TodoFields {
  const fields: TodoFields = {
    description: config.template.description,
    priority: config.template.priority,
    done: false,
  };
  if (config.template.assignee) {
    fields.assignee = config.template.assignee;
  }
  return fields;
}
