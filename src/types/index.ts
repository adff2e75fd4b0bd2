/**
 * Central type exports
 */

// Tool registry, dispatch and envelope types
export * from './tools.js';

// SQL profiles and query results
export * from './sql.js';

// BMI calculation
export * from './bmi.js';
