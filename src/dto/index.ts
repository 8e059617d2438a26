export { CreateProjectDto, UpdateProjectDto } from './projects.dto';
export { CreateTextSourceDto, UpdateTextSourceDto } from './text-sources.dto';
export { CreateSummaryDto, UpdateSummaryDto } from './summaries.dto';
export {
  CreateTranslationDto,
  TranslationTokenDto,
  UpdateTranslationDto,
} from './translations.dto';
export { CreateVideoDto, UpdateVideoDto } from './videos.dto';
export { CreateLinkDto, UpdateLinkDto } from './links.dto';
