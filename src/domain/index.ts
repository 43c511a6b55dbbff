// Entities
export * from './entities/ResolvedResource';
export * from './entities/DownloadRequest';
export * from './entities/DownloadResult';

// Interfaces
export * from './interfaces/IMetadataResolver';
export * from './interfaces/IDownloadEngine';
export * from './interfaces/IDownloadSession';
export * from './interfaces/IFileStorage';
export * from './interfaces/IProgressReporter';
export * from './interfaces/IProvenanceMarker';

// Value Objects
export * from './value-objects/Filename';
export * from './value-objects/ResourceUrl';
