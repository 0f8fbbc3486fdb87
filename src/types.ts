export type EpochSeconds = number;

export type Version = string; // "<major>.<minor>", e.g. "3.11"

export type Project = {
  name: string;
  created_at: EpochSeconds;
  last_accessed: EpochSeconds;
};

export type ProjectLog = {
  version: Version;
  projects: Project[];
};

export type TableRow = {
  version: Version;
  project: Project;
};
