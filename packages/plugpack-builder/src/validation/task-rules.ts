/**
 * tasks.yaml checks
 */

import type { ValidationViolation } from '@plugpack/errors';
import { isMapping } from '../loader/document-loader';
import type { PluginSchema } from '../schema/types';
import { STAGE_PRIORITY_PATTERN } from '../stages/planner';
import { TASKS_FILE, TaskDescriptor } from '../types/plugin';
import { PathSegment, violation } from './violations';
import { issuesToViolations } from './zod-issues';

export interface TaskCheck {
  violations: ValidationViolation[];
  /** Present when every task passed */
  tasks?: TaskDescriptor[];
}

function checkStage(schema: PluginSchema, stage: string, at: PathSegment[]): ValidationViolation[] {
  const violations: ValidationViolation[] = [];
  const slash = stage.indexOf('/');
  const name = slash < 0 ? stage : stage.slice(0, slash);
  const postfix = slash < 0 ? null : stage.slice(slash + 1);

  if (!schema.stages.stages.includes(name)) {
    violations.push(
      violation(
        TASKS_FILE,
        at,
        'unknown-stage',
        `stage "${name}" is not known to package format ${schema.formatVersion}; ` +
          `use one of: ${schema.stages.stages.join(', ')}`
      )
    );
  }
  if (postfix !== null && !STAGE_PRIORITY_PATTERN.test(postfix)) {
    violations.push(
      violation(TASKS_FILE, at, 'stage-format', `stage "${stage}" must be "<name>" or "<name>/<number>", e.g. "${name}/10"`)
    );
  }
  return violations;
}

function checkParameters(
  schema: PluginSchema,
  taskId: string,
  type: string,
  parameters: Record<string, unknown>,
  at: PathSegment[]
): ValidationViolation[] {
  if (!Object.prototype.hasOwnProperty.call(schema.taskTypes, type)) {
    return [];
  }
  const rule = schema.taskTypes[type];

  const violations: ValidationViolation[] = [];
  const parsed = rule.parameters.safeParse(parameters);
  if (!parsed.success) {
    violations.push(...issuesToViolations(TASKS_FILE, parsed.error.issues, parameters, at));
  }

  if (rule.requiresTimeout) {
    const timeout = parameters.timeout;
    if (timeout === undefined || timeout === null) {
      violations.push(
        violation(
          TASKS_FILE,
          [...at, 'timeout'],
          'task-timeout-required',
          `task "${taskId}" of type "${type}" needs parameters.timeout, ${rule.timeoutHint} (for example "timeout: 360")`
        )
      );
    } else if (typeof timeout !== 'number' || !Number.isFinite(timeout) || timeout <= 0) {
      violations.push(
        violation(
          TASKS_FILE,
          [...at, 'timeout'],
          'field-type',
          `task "${taskId}" has timeout ${JSON.stringify(timeout)}; it must be a positive number of seconds`
        )
      );
    }
  }

  return violations;
}

export function checkTasks(schema: PluginSchema, content: unknown): TaskCheck {
  // An empty document declares no tasks
  const entries: unknown = content === null ? [] : content;
  if (!Array.isArray(entries)) {
    return {
      violations: [violation(TASKS_FILE, [], 'document-type', 'expected a list of tasks at the top level')],
    };
  }

  const violations: ValidationViolation[] = [];
  const tasks: TaskDescriptor[] = [];
  const firstUse = new Map<string, number>();

  entries.forEach((entry: unknown, index: number) => {
    const before = violations.length;

    if (!isMapping(entry)) {
      violations.push(violation(TASKS_FILE, [index], 'field-type', `task [${index}] must be a mapping`));
      return;
    }

    const parsed = schema.task.safeParse(entry);
    if (!parsed.success) {
      violations.push(...issuesToViolations(TASKS_FILE, parsed.error.issues, entry, [index]));
    }

    const id = typeof entry.id === 'string' && entry.id.length > 0 ? entry.id : `task-${index}`;
    const previous = firstUse.get(id);
    if (previous !== undefined) {
      violations.push(
        violation(TASKS_FILE, [index, 'id'], 'duplicate-task-id', `task id "${id}" is already used by task [${previous}]`)
      );
    } else {
      firstUse.set(id, index);
    }

    if (typeof entry.stage === 'string' && entry.stage.length > 0) {
      violations.push(...checkStage(schema, entry.stage, [index, 'stage']));
    }

    const parameters = isMapping(entry.parameters) ? entry.parameters : {};
    if (typeof entry.type === 'string') {
      violations.push(...checkParameters(schema, id, entry.type, parameters, [index, 'parameters']));
    }

    if (parsed.success && violations.length === before) {
      tasks.push({
        id,
        type: parsed.data.type,
        stage: parsed.data.stage,
        role: parsed.data.role,
        parameters: new Map(Object.entries(parameters)),
      });
    }
  });

  return violations.length === 0 ? { violations, tasks } : { violations };
}
