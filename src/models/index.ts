import { Link } from './link.model';
import { Project } from './project.model';
import { Summary } from './summary.model';
import { TextSource } from './text-source.model';
import { Translation } from './translation.model';
import { Video } from './video.model';

export * from './link.model';
export * from './project.model';
export * from './summary.model';
export * from './text-source.model';
export * from './translation.model';
export * from './video.model';

/**
 * Every model the store registers, parents before children.
 */
export const STORE_MODELS = [
  Project,
  TextSource,
  Summary,
  Translation,
  Video,
  Link,
];
