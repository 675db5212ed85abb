export const EVIDENCE_ALGEBRA_VERSION = '0.1.0';
