export {
  Lister,
  type ListerOptions,
  type ListerState,
  type ListerStep,
  type PageFetcher,
} from './lister';
