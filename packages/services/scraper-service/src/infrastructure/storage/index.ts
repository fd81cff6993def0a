export { LocalBlobStore } from './LocalBlobStore';
