import type { ChangesetBump, ChangesetStatus } from "../schema/changeset.schema";

export interface ChangesetSpec {
  package: string;
  bump: ChangesetBump;
  description: string;
  environments?: string[];
  /** Email of the author; MONOWEAVE_AUTHOR or GIT_AUTHOR_EMAIL otherwise. */
  author?: string;
}

export interface ChangesetFilter {
  package?: string;
  status?: ChangesetStatus;
  branch?: string;
  environment?: string;
  author?: string;
}

export interface ChangesetValidation {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

/** Which affected packages have a pending changeset on the branch. */
export interface ChangesetCoverage {
  branch?: string;
  covered: string[];
  uncovered: string[];
}
