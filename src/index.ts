// Public library surface.

export const VERSION = '0.1.0';

export * from './model/ontoumlModel';
export * from './model/loadModel';
export * from './model/modelIndex';
export * from './ontouml/stereotypes';
export * from './ontouml/multiplicity';
export * from './validation/graph';
export * from './validation/problems';
export * from './validation/validateModel';
export * from './validation/antipatterns';
export * from './report/validationReport';
export * from './report/reportBuilder';
export * from './report/markdownReport';
export * from './report/writeReport';
export * from './report/diagnosticSink';
export * from './scan/modelScanner';
export * from './util/deterministicJson';
