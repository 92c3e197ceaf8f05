// Core detection types
export * from './Fingerprint.js';
export * from './Findings.js';
export * from './RequestContext.js';
export * from './RiskAssessment.js';
export * from './Configuration.js';
