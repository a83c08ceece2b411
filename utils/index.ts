export * from './textStatistics';
export * from './abbreviations';
export * from './gradeLevels';
export * from './readability';
