export * from './artifacts/bufferArtifactStore';
export * from './artifacts/fsArtifactStore';
export type * from './artifacts/types';
export * from './config';
export * from './credentials/credentialVault';
export * from './logger';
export * from './mapper/artifactPaths';
export * from './mapper/fileMapper';
export * from './noteSyncEngine';
export * from './search/liveSearch';
export * from './search/searchService';
export * from './status';
export * from './store/cacheFile';
export * from './store/entityStore';
export * from './store/snapshot';
export * from './sync/memoryRemoteClient';
export * from './sync/remoteClient';
export * from './sync/syncEngine';
