/**
 * Response views.
 *
 * JSON has no bigint, so execution amounts leave the API as decimal
 * strings, the same form the audit log records them in.
 */

import type { Decision, ExecutionState, FundedProject } from "@afterword/execution";

export interface FundedProjectView {
  readonly recipient: string;
  readonly amount: string;
  readonly description: string;
  readonly fundedAt: number;
}

export interface ExecutionStateView extends Omit<ExecutionState, "treasury" | "fundedProjects" | "distributions"> {
  readonly treasury: string;
  readonly fundedProjects: readonly FundedProjectView[];
  readonly distributions: readonly FundedProjectView[];
}

export function toFundedProjectView(project: FundedProject): FundedProjectView {
  return { ...project, amount: project.amount.toString() };
}

export function toExecutionStateView(state: ExecutionState): ExecutionStateView {
  return {
    ...state,
    treasury: state.treasury.toString(),
    fundedProjects: state.fundedProjects.map(toFundedProjectView),
    distributions: state.distributions.map(toFundedProjectView),
  };
}

/** 201 when something was recorded, 200 for an inaction result */
export function decisionStatus(decision: Decision): 200 | 201 {
  return decision.outcome === "executed" ? 201 : 200;
}
