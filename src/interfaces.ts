export type PackageRelation = ReadonlyMap<string, ReadonlySet<string>>;

export type DependencyGraph = Map<string, Set<string>>;

export type TestMode = 'off' | 'readonly' | 'simulate';

export type AsciiTreeMode = 'off' | 'simple' | 'detailed';

// Raw commander values, before validation
export type CliOptions = {
  package?: string;
  repoUrl?: string;
  repoPath?: string;
  testMode?: string;
  asciiTree?: string;
  maxDepth?: string;
  filter?: string;
  wbs?: boolean;
  verbose?: boolean;
};

export interface CliConfig {
  packageName: string;
  repoUrl?: string;
  repoPath?: string;
  testMode: TestMode;
  asciiTree: AsciiTreeMode;
  maxDepth: number;
  filter: string;
  wbs: boolean;
  verbose: boolean;
}

/**
 * The subset of a fetch Response the index loader reads.
 */
export interface IndexResponse {
  ok: boolean;
  status: number;
  statusText: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type FetchIndex = (url: string) => Promise<IndexResponse>;
