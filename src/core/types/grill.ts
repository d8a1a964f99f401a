export interface GrillCommandOptions {
  pitch?: string;
  file?: string;
  provider?: string;
  model?: string;
  sequential?: boolean;
  aiTimeoutSec?: string;
  format?: string;
}
