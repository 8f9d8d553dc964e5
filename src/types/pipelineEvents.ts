/**
 * Pipeline Event Types
 *
 * Structured events emitted by the acquisition orchestrator during a run
 */

import type { AcquisitionOutcome, AcquisitionStage, RunSummary, SceneSource } from './scene.js';

export type PipelineEventType =
  | 'run_started'
  | 'search_completed'
  | 'scenes_selected'
  | 'scene_stage'
  | 'scene_completed'
  | 'run_completed';

export interface BasePipelineEvent {
  type: PipelineEventType;
  timestamp: Date;
}

export interface RunStartedEvent extends BasePipelineEvent {
  type: 'run_started';
  data: {
    daysBack: number;
    start: string;
    end: string;
  };
}

export interface SearchCompletedEvent extends BasePipelineEvent {
  type: 'search_completed';
  data: {
    provider: SceneSource;
    found: number;
    failed: boolean;
    skipped?: string;
  };
}

export interface ScenesSelectedEvent extends BasePipelineEvent {
  type: 'scenes_selected';
  data: {
    granuleNames: string[];
    targetTime: string;
    daysFromTarget: number | null;
    noValidScenes: boolean;
  };
}

export interface SceneStageEvent extends BasePipelineEvent {
  type: 'scene_stage';
  data: {
    granuleName: string;
    stage: AcquisitionStage;
  };
}

export interface SceneCompletedEvent extends BasePipelineEvent {
  type: 'scene_completed';
  data: AcquisitionOutcome;
}

export interface RunCompletedEvent extends BasePipelineEvent {
  type: 'run_completed';
  data: {
    summary: RunSummary;
    summaryPath: string;
  };
}

export type PipelineEvent =
  | RunStartedEvent
  | SearchCompletedEvent
  | ScenesSelectedEvent
  | SceneStageEvent
  | SceneCompletedEvent
  | RunCompletedEvent;

export type PipelineEventListener = (event: PipelineEvent) => void;
