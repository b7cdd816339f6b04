export interface TableauSession {
  token: string;
  /** Site LUID returned by sign-in, not the content URL. */
  siteId: string;
  userId?: string;
}

export interface TableauProject {
  id: string;
  name: string;
}

export interface TableauDatasource {
  id: string;
  name: string;
  projectId: string;
  projectName?: string;
}

export interface DatasetInfo {
  name: string;
  id: string;
  project_id: string;
  file_path?: string;
}

export type DatasetCheckResult =
  | { exists: true; name: string; id: string; project_id: string }
  | { exists: false; name: string; project: string };

/** Dataset operations the tool executor needs from Tableau Server. */
export interface DatasetGateway {
  connect(): Promise<TableauSession>;
  release(session: TableauSession): Promise<void>;
  resolveProjectId(session: TableauSession, projectName: string): Promise<string>;
  /** Publishes in overwrite mode; the dataset is named after the file stem. */
  upload(session: TableauSession, filePath: string, projectName: string): Promise<DatasetInfo>;
  check(session: TableauSession, datasetName: string, projectName: string): Promise<DatasetCheckResult>;
  list(session: TableauSession, projectName: string): Promise<DatasetInfo[]>;
}
