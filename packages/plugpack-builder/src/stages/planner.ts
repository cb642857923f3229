/**
 * Stage Planner
 *
 * Orders tasks by the position of their stage in the version's vocabulary,
 * then by the numeric postfix of the stage (`post_deployment/20`), then by
 * declaration order.
 */

import { StagePlanError } from '@plugpack/errors';
import type { StageVocabulary } from '../schema/types';
import type { TaskDescriptor } from '../types/plugin';

export interface ParsedStage {
  name: string;
  /** Numeric postfix; 0 when the stage has none */
  priority: number;
}

export type TiePolicy = 'declaration-order' | 'error';

export const TIE_POLICIES: readonly TiePolicy[] = ['declaration-order', 'error'];

export interface PlanOptions {
  vocabulary: StageVocabulary;
  /** What to do with tasks sharing stage and priority (default: declaration-order) */
  ties?: TiePolicy;
}

export interface PlannedStep {
  /** `reboot` steps pause the deployment and restart the node */
  kind: 'task' | 'reboot';
  /** 0-based position in the plan */
  position: number;
  stage: ParsedStage;
  task: TaskDescriptor;
}

const STAGE_PATTERN = /^([a-z][a-z_]*)(?:\/([-+]?(?:\d*\.\d+|\d+)))?$/;

/** Postfix of a stage, e.g. `20`, `-5`, `1.5` */
export const STAGE_PRIORITY_PATTERN = /^[-+]?(?:\d*\.\d+|\d+)$/;

/**
 * @returns null when the string is not of the form `name` or `name/number`
 */
export function parseStage(stage: string): ParsedStage | null {
  const match = STAGE_PATTERN.exec(stage);
  if (!match) {
    return null;
  }
  return {
    name: match[1],
    priority: match[2] === undefined ? 0 : Number(match[2]),
  };
}

interface SortKey {
  order: number;
  stage: ParsedStage;
  index: number;
  task: TaskDescriptor;
}

export function plan(tasks: readonly TaskDescriptor[], options: PlanOptions): PlannedStep[] {
  const { vocabulary, ties = 'declaration-order' } = options;

  const keys: SortKey[] = tasks.map((task, index) => {
    const stage = parseStage(task.stage);
    if (!stage) {
      throw new StagePlanError(`Task "${task.id}" has a malformed stage "${task.stage}"`, { task: task.id });
    }
    const order = vocabulary.stages.indexOf(stage.name);
    if (order < 0) {
      throw new StagePlanError(`Task "${task.id}" references unknown stage "${stage.name}"`, {
        task: task.id,
        stages: [...vocabulary.stages],
      });
    }
    return { order, stage, index, task };
  });

  keys.sort((a, b) => a.order - b.order || a.stage.priority - b.stage.priority || a.index - b.index);

  if (ties === 'error') {
    for (let i = 1; i < keys.length; i++) {
      const prev = keys[i - 1];
      const curr = keys[i];
      if (prev.order === curr.order && prev.stage.priority === curr.stage.priority) {
        throw new StagePlanError(
          `Tasks "${prev.task.id}" and "${curr.task.id}" share stage ${curr.stage.name}/${curr.stage.priority}`,
          { tasks: [prev.task.id, curr.task.id], stage: curr.task.stage }
        );
      }
    }
  }

  return keys.map((key, position) => ({
    kind: vocabulary.rebootTaskType !== null && key.task.type === vocabulary.rebootTaskType ? 'reboot' : 'task',
    position,
    stage: key.stage,
    task: key.task,
  }));
}
