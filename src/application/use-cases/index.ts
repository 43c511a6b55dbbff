export * from './DownloadResourcesUseCase';
export * from './ResolveResourcesUseCase';
export * from './CleanTempUseCase';
