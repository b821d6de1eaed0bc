export type ProjectClassification = 'client' | 'team-member';

export interface SourceComment {
  id: string;
  authorName?: string;
  text: string;
  createdAt?: string;
}

export interface SourceTask {
  /** Source-local id (opaque, unique across the whole source workspace). */
  id: string;
  name: string;
  assigneeNames: string[];
  creatorName?: string;
  /** Free-text category label; may be empty. */
  categoryLabel: string;
  completed: boolean;
  completedAt: string | null;
  createdAt?: string;
  dueOn?: string;
  startOn?: string;
  notes?: string;
  /** Board column / section the task sits in. */
  section?: string;
  isMilestone: boolean;
  /** Custom field name -> display value. */
  customFields: Record<string, string>;
  comments: SourceComment[];
  projectId: string;
  projectName: string;
}

export interface SourceProject {
  id: string;
  name: string;
  classification: ProjectClassification;
  notes?: string;
  startOn?: string;
  dueOn?: string;
  tasks: SourceTask[];
}

export interface ProjectRef {
  by: 'gid' | 'name';
  value: string;
}

export type PhaseType = 'phase' | 'milestone';

export interface PhaseSpec {
  title: string;
  type: PhaseType;
  startDate?: string;
  endDate?: string;
}

/** A task after transformation, still carrying names the importer resolves. */
export interface PlannedTask {
  sourceId: string;
  name: string;
  description?: string;
  /** Destination activity type name (category mapper output). */
  activityName: string;
  assigneeNames: string[];
  ownerName?: string;
  phaseName?: string;
  isCompleted: boolean;
  status: TaskStatusCode;
  datetimeCompleted?: string;
  datetimeDue?: string;
  startDatetime?: string;
  priorityId?: 1 | 2 | 3;
  durationPlanned?: string;
  durationActual?: string;
  comments: SourceComment[];
}

export type TaskStatusCode = 'task_status1' | 'task_status2' | 'task_status4';

export interface ProjectPlan {
  source: SourceProject;
  classification: ProjectClassification;
  companyName?: string;
  managerName?: string;
  description?: string;
  startDate?: string;
  deadline?: string;
  phases: PhaseSpec[];
  tasks: PlannedTask[];
  counts: {
    written: number;
    excluded: number;
    deduplicated: number;
    replaced: number;
  };
}

/** Destination-shaped task record sent to the task upsert endpoint. */
export interface NormalizedTask {
  event_name: string;
  project_id: number;
  project_phase_id?: number;
  activity_id?: number;
  owner_id: number;
  related_users: number[];
  is_completed: boolean;
  status: TaskStatusCode;
  description?: string;
  datetime_completed?: string;
  datetime_due?: string;
  start_datetime?: string;
  priority_id?: number;
  duration_planned?: string;
  duration_actual?: string;
}

export interface ProjectInput {
  project_name: string;
  company_id?: number;
  manager_id?: number;
  status?: string;
  deadline?: string;
  date?: string;
  description?: string;
}

export interface PhaseInput {
  project_id: number;
  type: PhaseType;
  title: string;
  start_date?: string;
  end_date?: string;
}

export interface CommentInput {
  module: 'tasks' | 'projects';
  object_id: number;
  comment: string;
  user_id: number;
}
