export * from './lab.schema';
export * from './presentation.schema';
export * from './history.schema';
export * from './findings.schema';
export * from './assessment.schema';
export * from './course.schema';
export * from './follow-up.schema';
export * from './treatments.schema';
export * from './labs.schema';
export * from './facility-timing.schema';
export * from './diagnosis.schema';
export * from './medication-risk.schema';
