/**
 * Command Translator
 *
 * Turns a high-level BrainCommand into the ordered CerebellumAction sequence
 * the motion side executes. Translation is pure: the same command always
 * yields the same actions, and action ids derive from the command id.
 *
 * Every command type declares a closed parameter schema. Parameters outside
 * the schema are rejected, not ignored.
 */

import { z } from 'zod'
import { BrainPipelineError } from './errors'
import type { BrainCommand, CerebellumAction, JsonObject } from './types'

// ---------------------------------------------------------------------------
// Parameter schemas
// ---------------------------------------------------------------------------

export const Vector3Schema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number(),
}).strict()

export const QuaternionSchema = z.object({
  x: z.number().default(0),
  y: z.number().default(0),
  z: z.number().default(0),
  w: z.number().default(1),
}).strict()

export const PoseSchema = z.object({
  position: Vector3Schema,
  orientation: QuaternionSchema.optional(),
}).strict()

export const MoveParamsSchema = z.object({
  target_position: Vector3Schema,
  velocity: z.number().positive().default(0.5),
  orientation: QuaternionSchema.optional(),
  behavior_tree: z.string().optional(),
}).strict()

export const GraspParamsSchema = z.object({
  grasp_pose: PoseSchema,
  approach_pose: PoseSchema.optional(),
  gripper_width: z.number().positive().default(0.1),
  grasp_force: z.number().positive().default(10),
}).strict()

export const ReleaseParamsSchema = z.object({
  place_pose: PoseSchema.optional(),
  gripper_width: z.number().positive().default(0.1),
}).strict()

export const StopParamsSchema = z.object({}).strict()

export const EmergencyStopParamsSchema = z.object({
  reason: z.string().default('emergency stop'),
}).strict()

type Pose = z.infer<typeof PoseSchema>

const IDENTITY_ORIENTATION = { x: 0, y: 0, z: 0, w: 1 }

// ---------------------------------------------------------------------------
// Translator
// ---------------------------------------------------------------------------

/** An action before ids and sequence numbers are assigned */
export interface ActionDraft {
  actionType: string
  topic: string
  payload: JsonObject
  timeoutMs?: number
}

export interface CommandTranslation<S extends z.ZodTypeAny> {
  commandTypes: readonly string[]
  schema: S
  build: (params: z.infer<S>, command: BrainCommand) => ActionDraft[]
}

type TranslateFn = (command: BrainCommand) => ActionDraft[]

export class CommandTranslator {
  private byType = new Map<string, TranslateFn>()

  register<S extends z.ZodTypeAny>(translation: CommandTranslation<S>): void {
    const translate: TranslateFn = command => {
      const parsed = translation.schema.safeParse(command.parameters)
      if (!parsed.success) {
        const issue = parsed.error.issues[0]
        const where = issue?.path.join('.') || 'parameters'
        throw new BrainPipelineError(
          'INVALID_PARAMETERS',
          `Invalid parameters for ${command.commandType} at ${where}: ${issue?.message ?? 'unknown'}`,
          { commandId: command.commandId, commandType: command.commandType }
        )
      }
      return translation.build(parsed.data, command)
    }

    for (const commandType of translation.commandTypes) {
      if (this.byType.has(commandType)) {
        console.warn(`[CommandTranslator] Replacing translation for "${commandType}"`)
      }
      this.byType.set(commandType, translate)
    }
  }

  canTranslate(commandType: string): boolean {
    return this.byType.has(commandType)
  }

  supportedTypes(): string[] {
    return Array.from(this.byType.keys()).sort()
  }

  translate(command: BrainCommand): CerebellumAction[] {
    const translate = this.byType.get(command.commandType)
    if (!translate) {
      throw new BrainPipelineError(
        'UNKNOWN_COMMAND_TYPE',
        `Unknown command type: ${command.commandType}`,
        { commandId: command.commandId, commandType: command.commandType }
      )
    }

    return translate(command).map((draft, sequenceIndex) => Object.freeze({
      actionId: `${command.commandId}:${sequenceIndex}`,
      commandId: command.commandId,
      actionType: draft.actionType,
      topic: draft.topic,
      payload: Object.freeze({ ...draft.payload }),
      sequenceIndex,
      timeoutMs: draft.timeoutMs ?? command.timeoutMs,
    }))
  }
}

// ---------------------------------------------------------------------------
// Built-in translations
// ---------------------------------------------------------------------------

function poseOf(pose: Pose): JsonObject {
  return {
    position: pose.position,
    orientation: pose.orientation ?? IDENTITY_ORIENTATION,
  }
}

function armMove(pose: Pose, motion: 'plan' | 'linear'): ActionDraft {
  return {
    actionType: 'moveit_move',
    topic: '/move_group',
    payload: { target_pose: poseOf(pose), planning_group: 'arm', motion },
  }
}

function gripper(command: 'open' | 'close', settings: JsonObject): ActionDraft {
  return {
    actionType: 'gripper_control',
    topic: '/gripper/command',
    payload: { command, ...settings },
  }
}

export const moveTranslation: CommandTranslation<typeof MoveParamsSchema> = {
  commandTypes: ['move', 'move_to', 'navigate'],
  schema: MoveParamsSchema,
  build: params => {
    const payload: JsonObject = {
      pose: {
        position: params.target_position,
        orientation: params.orientation ?? IDENTITY_ORIENTATION,
      },
      velocity: params.velocity,
    }
    if (params.behavior_tree) payload.behavior_tree = params.behavior_tree
    return [{ actionType: 'nav2_navigate_to_pose', topic: '/navigate_to_pose', payload }]
  },
}

// Approach pose first; the linear move closes in with the gripper already open
export const graspTranslation: CommandTranslation<typeof GraspParamsSchema> = {
  commandTypes: ['grasp', 'pick', 'grab'],
  schema: GraspParamsSchema,
  build: params => [
    armMove(params.approach_pose ?? params.grasp_pose, 'plan'),
    gripper('open', { width: params.gripper_width }),
    armMove(params.grasp_pose, 'linear'),
    gripper('close', { force: params.grasp_force }),
  ],
}

export const releaseTranslation: CommandTranslation<typeof ReleaseParamsSchema> = {
  commandTypes: ['release', 'place'],
  schema: ReleaseParamsSchema,
  build: params => {
    const open = gripper('open', { width: params.gripper_width })
    return params.place_pose ? [armMove(params.place_pose, 'plan'), open] : [open]
  },
}

export const stopTranslation: CommandTranslation<typeof StopParamsSchema> = {
  commandTypes: ['stop'],
  schema: StopParamsSchema,
  build: () => [{
    actionType: 'halt',
    topic: '/cmd_vel',
    payload: { linear: { x: 0, y: 0, z: 0 }, angular: { x: 0, y: 0, z: 0 } },
  }],
}

export const emergencyStopTranslation: CommandTranslation<typeof EmergencyStopParamsSchema> = {
  commandTypes: ['emergency_stop'],
  schema: EmergencyStopParamsSchema,
  build: params => [{
    actionType: 'emergency_stop',
    topic: '/emergency_stop',
    payload: { reason: params.reason },
    timeoutMs: 1_000,
  }],
}

export function createCommandTranslator(): CommandTranslator {
  const translator = new CommandTranslator()
  translator.register(moveTranslation)
  translator.register(graspTranslation)
  translator.register(releaseTranslation)
  translator.register(stopTranslation)
  translator.register(emergencyStopTranslation)
  return translator
}
