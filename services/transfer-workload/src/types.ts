export type ParsedArgs =
  | { kind: 'help' }
  | {
      kind: 'run';
      verbose: boolean;
      tokenUrl: string;
      clientId: string;
      clientSecret: string;
      username: string;
      password: string;
    };

export type TransferOutcome = 'committed' | 'insufficient-funds' | 'retry-exhausted';

export interface WorkloadReport {
  accountIds: string[];
  outcome: TransferOutcome;
  attempts: number | null;
}

export type PhaseResult =
  | { label: string; status: 'completed'; report: WorkloadReport }
  | { label: string; status: 'rejected'; error: string };
