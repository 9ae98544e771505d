export * from './InteractionEvent.js';
export * from './FeatureVector.js';
export * from './BaselineProfile.js';
export * from './AnomalyScores.js';
export * from './RiskReport.js';
export * from './Configuration.js';
