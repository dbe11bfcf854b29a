export * from './study-session.js';
export * from './study-timer.js';
