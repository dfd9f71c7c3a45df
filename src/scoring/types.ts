export interface ScoreResult<P extends string = string> {
  principle: P;
  score: number;
  compliant: boolean;
  evidence: string[];
  issues: string[];
  recommendation: string;
}
