import { TestingModule } from '@nestjs/testing';
import { NotFoundError } from '../dal/database.errors';
import { createStoreTestingModule } from '../testing/store-testing.module';
import { ProjectsRepository } from './projects.repository';
import { SummariesRepository } from './summaries.repository';
import { TextSourcesRepository } from './text-sources.repository';

describe('SummariesRepository', () => {
  let module: TestingModule;
  let repository: SummariesRepository;
  let projectId: number;
  let sourceId: number;

  beforeEach(async () => {
    module = await createStoreTestingModule();
    repository = module.get(SummariesRepository);

    const project = await module
      .get(ProjectsRepository)
      .create({ name: 'Digest' });
    const source = await module
      .get(TextSourcesRepository)
      .create({ project_id: project.id, content: 'Long article' });
    projectId = project.id;
    sourceId = source.id;
  });

  afterEach(async () => {
    await module.close();
  });

  it('should default the summary type to general', async () => {
    const created = await repository.create({
      text_source_id: sourceId,
      content: 'Gist',
    });

    expect(created.summary_type).toBe('general');
    await expect(repository.getById(created.id)).resolves.toEqual(created);
  });

  it('should refuse a summary for a missing text source', async () => {
    await expect(
      repository.create({ text_source_id: 77, content: 'orphan' }),
    ).rejects.toMatchObject({ resource: 'TextSource', identifier: 77 });
  });

  it('should give concurrent creates distinct ids', async () => {
    const created = await Promise.all(
      Array.from({ length: 8 }, (_, index) =>
        repository.create({
          text_source_id: sourceId,
          content: `summary ${index}`,
        }),
      ),
    );

    const ids = new Set(created.map((summary) => summary.id));
    expect(ids.size).toBe(8);
    await expect(repository.count({ text_source_id: sourceId })).resolves.toBe(
      8,
    );
  });

  it('should list summaries of one type', async () => {
    await repository.create({ text_source_id: sourceId, content: 'a' });
    await repository.create({
      text_source_id: sourceId,
      content: 'b',
      summary_type: 'bullet',
    });

    const bullets = await repository.getByType(sourceId, 'bullet');

    expect(bullets.map((summary) => summary.content)).toEqual(['b']);
  });

  it('should list summaries of one type across a project', async () => {
    const textSources = module.get(TextSourcesRepository);
    const second = await textSources.create({
      project_id: projectId,
      content: 'Second article',
    });
    const elsewhere = await module
      .get(ProjectsRepository)
      .create({ name: 'Elsewhere' });
    const foreign = await textSources.create({
      project_id: elsewhere.id,
      content: 'Foreign article',
    });

    await repository.create({
      text_source_id: sourceId,
      content: 'first bullet',
      summary_type: 'bullet',
    });
    await repository.create({ text_source_id: second.id, content: 'general' });
    await repository.create({
      text_source_id: second.id,
      content: 'second bullet',
      summary_type: 'bullet',
    });
    await repository.create({
      text_source_id: foreign.id,
      content: 'foreign bullet',
      summary_type: 'bullet',
    });

    const bullets = await repository.getByProjectType(projectId, 'bullet');

    expect(bullets.map((summary) => summary.content)).toEqual([
      'first bullet',
      'second bullet',
    ]);
  });

  it('should search content optionally within one type', async () => {
    await repository.create({
      text_source_id: sourceId,
      content: 'Budget vote delayed',
    });
    await repository.create({
      text_source_id: sourceId,
      title: 'BUDGET',
      content: 'Key points',
      summary_type: 'bullet',
    });

    const all = await repository.searchContent('budget');
    const bullets = await repository.searchContent('budget', 'bullet');

    expect(all).toHaveLength(2);
    expect(bullets.map((summary) => summary.title)).toEqual(['BUDGET']);
  });

  it('should list distinct summary types', async () => {
    const other = await module.get(TextSourcesRepository).create({
      project_id: projectId,
      content: 'Other article',
    });
    await repository.create({
      text_source_id: sourceId,
      content: 'x',
      summary_type: 'timeline',
    });
    await repository.create({ text_source_id: sourceId, content: 'y' });
    await repository.create({ text_source_id: sourceId, content: 'z' });
    await repository.create({
      text_source_id: other.id,
      content: 'w',
      summary_type: 'bullet',
    });

    await expect(repository.getAvailableTypes()).resolves.toEqual([
      'bullet',
      'general',
      'timeline',
    ]);
    await expect(repository.getAvailableTypes(sourceId)).resolves.toEqual([
      'general',
      'timeline',
    ]);
  });

  it('should remove summaries with their text source', async () => {
    const summary = await repository.create({
      text_source_id: sourceId,
      content: 'Bound',
    });

    await module.get(TextSourcesRepository).delete(sourceId);

    await expect(repository.getById(summary.id)).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });
});
