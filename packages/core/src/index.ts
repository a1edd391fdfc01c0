// Configuration
export * from './constants';
export * from './contracts';
export * from './errors';

// Categories
export * from './categories';

// Classifier
export * from './classifier';

// Events
export * from './events';

// Organizer
export * from './organizer';
