export interface ConventionalCommit {
  type: string;
  scope?: string;
  description: string;
  body?: string;
  breaking: boolean;
  breakingDescription?: string;
  hash: string;
  authorName?: string;
  date?: string;
}

export interface ChangelogInput {
  packageName: string;
  version: string;
  /** YYYY-MM-DD */
  date: string;
  previousVersion?: string;
  commits: ConventionalCommit[];
}

export interface CommitGroup {
  title: string;
  commits: ConventionalCommit[];
}
