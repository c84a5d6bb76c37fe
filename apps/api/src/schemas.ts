import { QualifiedName } from './query/render';
import { VerificationStatus } from './types/schema';

export const PROD_SCHEMA = 'prod';

export const rawSchema = (status: VerificationStatus) => `raw_${status}`;
export const stageSchema = (status: VerificationStatus) => `stage_${status}`;
export const prodTable = (status: VerificationStatus): QualifiedName => ({
  schema: PROD_SCHEMA,
  name: `${status}_projects`
});

export const statusOf = (verified: boolean): VerificationStatus => (verified ? 'verified' : 'unverified');
