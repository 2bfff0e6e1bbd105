import { z } from 'zod';
import { TASK_STATES, TASK_TYPES } from '../types/index.js';

const TaskStateSchema = z.enum(TASK_STATES);
const TaskTypeSchema = z.enum(TASK_TYPES);

export const TransitionTableSchema = z.record(TaskStateSchema, z.array(TaskStateSchema));

export const DispatchConfigSchema = z.object({
  maxConcurrency: z.number().int().positive(),
  maxRounds: z.number().int().positive(),
});

export const TrackerConfigSchema = z
  .object({
    maxIterations: z.number().int().nonnegative(),
    pendingStates: z.array(TaskStateSchema).min(1),
    satisfiedStates: z.array(TaskStateSchema).min(1),
    requiredGates: z.record(TaskTypeSchema, z.array(z.string().min(1))),
    transitions: z.record(TaskTypeSchema, TransitionTableSchema),
    dispatch: DispatchConfigSchema,
  })
  .superRefine((config, ctx) => {
    for (const state of config.pendingStates) {
      if (state === 'blocked' || state === 'complete') {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['pendingStates'],
          message: `${state} cannot be a pending state`,
        });
      }
      if (config.satisfiedStates.includes(state)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['satisfiedStates'],
          message: `${state} cannot both be pending and satisfy dependencies`,
        });
      }
    }
    if (!config.satisfiedStates.includes('complete')) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['satisfiedStates'],
        message: 'complete must satisfy dependencies',
      });
    }
    if (config.satisfiedStates.includes('blocked')) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['satisfiedStates'],
        message: 'blocked cannot satisfy dependencies',
      });
    }
    // The dispatcher starts a task by moving it out of its pending state
    for (const [type, table] of Object.entries(config.transitions)) {
      for (const pending of config.pendingStates) {
        for (const target of table?.[pending] ?? []) {
          if (target === 'blocked' || target === 'complete') {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ['transitions', type, pending],
              message: `a task cannot move from ${pending} straight to ${target}`,
            });
          }
        }
      }
    }
  });

// Shape of a user config file: every key optional, merged over the defaults
export const TrackerConfigOverrideSchema = z
  .object({
    maxIterations: z.number().int().nonnegative(),
    pendingStates: z.array(TaskStateSchema).min(1),
    satisfiedStates: z.array(TaskStateSchema).min(1),
    requiredGates: z.record(TaskTypeSchema, z.array(z.string().min(1))),
    transitions: z.record(TaskTypeSchema, TransitionTableSchema),
    dispatch: DispatchConfigSchema.partial(),
  })
  .partial()
  .strict();

export type TransitionTable = z.infer<typeof TransitionTableSchema>;
export type DispatchConfig = z.infer<typeof DispatchConfigSchema>;
export type TrackerConfig = z.infer<typeof TrackerConfigSchema>;
export type TrackerConfigOverride = z.infer<typeof TrackerConfigOverrideSchema>;
