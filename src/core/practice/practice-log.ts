/**
 * Practice Log
 *
 * Turns what the golfer entered at the range (template picks, scores,
 * conditions) into a stored {@link PracticeSession}. Each drill is built
 * from its template:
 *
 * - scored: `maxScore` from the result or the template, `actualScore` from
 *   the result (0 when left out)
 * - completion: `isCompleted` from the result
 *
 * A missing wind label or course type is derived from the wind bearing and
 * the course name.
 */

import {
  courseTypeForName,
  emptyConditions,
  windDirectionToText,
  type Drill,
  type PracticeSession,
  type SessionConditions,
} from '../models';
import type { DrillTemplate, DrillTemplateService } from '../templates';
import { LogSessionError } from './errors';

/**
 * One drill as entered by the golfer.
 */
export interface DrillResultInput {
  templateId: string;
  /** Successful attempts (scored templates) */
  score?: number;
  /** Overrides the template's attempt count (scored templates) */
  maxScore?: number;
  /** Outcome (completion templates) */
  isCompleted?: boolean;
  notes?: string | null;
}

export interface LogSessionInput {
  /** Defaults to now */
  date?: Date;
  notes?: string | null;
  drills: DrillResultInput[];
  conditions?: Partial<SessionConditions>;
}

/**
 * A session ready to be written; the store assigns the ids.
 */
export type NewPracticeSession = Omit<PracticeSession, 'id' | 'drills'> & {
  drills: Omit<Drill, 'id'>[];
};

/**
 * Persistence the practice log writes through.
 */
export interface SessionWriter {
  create(session: NewPracticeSession): Promise<PracticeSession>;
}

/**
 * Builds a drill from a template and the golfer's result.
 *
 * @throws LogSessionError 'scoreOutOfRange' when the score is negative or
 *   above the attempt count, 'missingResult' when a completion drill has no
 *   outcome
 */
export function buildDrill(
  template: DrillTemplate,
  result: DrillResultInput,
  completedAt: Date,
  drillIndex: number | null = null
): Omit<Drill, 'id'> {
  const base = {
    name: template.name,
    description: template.description,
    category: template.category,
    scoringType: template.scoringType,
    notes: result.notes ?? null,
    completedAt,
  };

  if (template.scoringType === 'completion') {
    if (result.isCompleted === undefined) {
      throw new LogSessionError(
        'missingResult',
        `"${template.name}" is a completion drill and needs isCompleted`,
        drillIndex
      );
    }
    return { ...base, maxScore: null, actualScore: null, isCompleted: result.isCompleted };
  }

  const maxScore = result.maxScore ?? template.defaultMaxScore;
  const actualScore = result.score ?? 0;
  if (actualScore < 0 || actualScore > maxScore) {
    throw new LogSessionError(
      'scoreOutOfRange',
      `Score ${actualScore} for "${template.name}" must be between 0 and ${maxScore}`,
      drillIndex
    );
  }
  return { ...base, maxScore, actualScore, isCompleted: null };
}

/**
 * Fills in an empty conditions block from what was supplied, deriving the
 * wind label and course type when they were left out.
 */
export function resolveConditions(input: Partial<SessionConditions> = {}): SessionConditions {
  const conditions: SessionConditions = { ...emptyConditions(), ...input };

  if (conditions.windDirectionText === null) {
    conditions.windDirectionText = windDirectionToText(conditions.windDirection);
  }
  if (conditions.courseType === null && conditions.courseName !== null) {
    conditions.courseType = courseTypeForName(conditions.courseName);
  }
  return conditions;
}

export class PracticeLogService {
  constructor(
    private readonly templates: DrillTemplateService,
    private readonly sessions: SessionWriter,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Validates every drill against its template, then stores the session.
   *
   * @throws LogSessionError when a template is unknown or a result does not
   *   fit its template
   */
  async logSession(input: LogSessionInput): Promise<PracticeSession> {
    const date = input.date ?? this.clock();

    const drills: Omit<Drill, 'id'>[] = [];
    for (const [index, result] of input.drills.entries()) {
      const template = await this.templates.getTemplate(result.templateId);
      if (template === null) {
        throw new LogSessionError(
          'unknownTemplate',
          `No drill template with ID '${result.templateId}'`,
          index
        );
      }
      drills.push(buildDrill(template, result, date, index));
    }

    return this.sessions.create({
      date,
      notes: input.notes ?? null,
      drills,
      ...resolveConditions(input.conditions),
    });
  }
}
