import { TestingModule } from '@nestjs/testing';
import { NotFoundError } from '../dal/database.errors';
import { createStoreTestingModule } from '../testing/store-testing.module';
import { JSONLogger } from '../utils/logger';
import { LinksRepository, RECOGNIZED_LINK_TYPES } from './links.repository';
import { ProjectsRepository } from './projects.repository';
import { TextSourcesRepository } from './text-sources.repository';

describe('LinksRepository', () => {
  let module: TestingModule;
  let repository: LinksRepository;
  let projectId: number;
  let sourceId: number;

  beforeEach(async () => {
    module = await createStoreTestingModule();
    repository = module.get(LinksRepository);

    const project = await module
      .get(ProjectsRepository)
      .create({ name: 'Sources' });
    const source = await module
      .get(TextSourcesRepository)
      .create({ project_id: project.id, content: 'Cited article' });
    projectId = project.id;
    sourceId = source.id;
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await module.close();
  });

  it('should default to an active reference', async () => {
    const created = await repository.create({
      text_source_id: sourceId,
      url: 'https://example.com/story',
    });

    expect(created).toMatchObject({
      link_type: 'reference',
      is_active: true,
      title: null,
      description: null,
    });
  });

  it('should deactivate and reactivate without deleting', async () => {
    const { id } = await repository.create({
      text_source_id: sourceId,
      url: 'https://example.com/story',
    });

    await expect(repository.deactivate(id)).resolves.toMatchObject({
      id,
      is_active: false,
    });
    await expect(repository.getActiveBySourceId(sourceId)).resolves.toEqual(
      [],
    );
    await expect(repository.getBySourceId(sourceId)).resolves.toHaveLength(1);

    await expect(repository.activate(id)).resolves.toMatchObject({
      is_active: true,
    });
    await expect(
      repository.getActiveBySourceId(sourceId),
    ).resolves.toHaveLength(1);
  });

  it('should raise NotFoundError when deactivating a missing link', async () => {
    await expect(repository.deactivate(5)).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });

  it('should list links of one type', async () => {
    await repository.create({
      text_source_id: sourceId,
      url: 'https://example.com/a',
    });
    await repository.create({
      text_source_id: sourceId,
      url: 'https://example.com/b',
      link_type: 'citation',
    });

    const citations = await repository.getByType(sourceId, 'citation');

    expect(citations.map((link) => link.url)).toEqual([
      'https://example.com/b',
    ]);
  });

  it('should list active links of one type across a project', async () => {
    const second = await module
      .get(TextSourcesRepository)
      .create({ project_id: projectId, content: 'Second' });
    await repository.create({
      text_source_id: sourceId,
      url: 'https://example.com/one',
      link_type: 'media',
    });
    const hidden = await repository.create({
      text_source_id: second.id,
      url: 'https://example.com/two',
      link_type: 'media',
    });
    await repository.create({
      text_source_id: second.id,
      url: 'https://example.com/three',
      link_type: 'media',
    });
    await repository.deactivate(hidden.id);

    const media = await repository.getByProjectType(projectId, 'media');

    expect(media.map((link) => link.url)).toEqual([
      'https://example.com/one',
      'https://example.com/three',
    ]);
  });

  it('should find and deactivate active links by domain', async () => {
    await repository.create({
      text_source_id: sourceId,
      url: 'https://news.example.org/1',
    });
    await repository.create({
      text_source_id: sourceId,
      url: 'http://news.example.org/2',
    });
    await repository.create({
      text_source_id: sourceId,
      url: 'https://other.test/3',
    });

    const found = await repository.getByDomain('example.org');
    expect(found.map((link) => link.url)).toEqual([
      'https://news.example.org/1',
      'http://news.example.org/2',
    ]);

    const deactivated = await repository.bulkDeactivateByDomain('example.org');
    const again = await repository.bulkDeactivateByDomain('example.org');

    expect(deactivated).toBe(2);
    expect(again).toBe(0);
    await expect(repository.getByDomain('example.org')).resolves.toEqual([]);
  });

  it('should match the domain literally', async () => {
    await repository.create({
      text_source_id: sourceId,
      url: 'https://my_site.test/a',
    });
    await repository.create({
      text_source_id: sourceId,
      url: 'https://myXsite.test/b',
    });

    const found = await repository.getByDomain('my_site');

    expect(found.map((link) => link.url)).toEqual(['https://my_site.test/a']);
  });

  it('should only return active links from search', async () => {
    await repository.create({
      text_source_id: sourceId,
      url: 'https://example.com/a',
      title: 'Census Data',
    });
    const retired = await repository.create({
      text_source_id: sourceId,
      url: 'https://example.com/b',
      description: 'old census tables',
    });
    await repository.deactivate(retired.id);

    const hits = await repository.search('CENSUS');

    expect(hits.map((link) => link.title)).toEqual(['Census Data']);
  });

  it('should report link statistics', async () => {
    const first = await repository.create({
      text_source_id: sourceId,
      url: 'https://example.com/a',
    });
    await repository.create({
      text_source_id: sourceId,
      url: 'http://example.com/b',
      link_type: 'source',
    });
    await repository.create({
      text_source_id: sourceId,
      url: 'https://example.com/c',
      link_type: 'source',
    });
    await repository.deactivate(first.id);

    await expect(repository.getStatistics(sourceId)).resolves.toEqual({
      total_links: 3,
      active_links: 2,
      inactive_links: 1,
      type_count: 2,
      secure_links: 2,
    });
    await expect(repository.getAvailableTypes(sourceId)).resolves.toEqual([
      'reference',
      'source',
    ]);
  });

  it('should store a URL without scheme or host and warn about it', async () => {
    const warn = jest.spyOn(JSONLogger.prototype, 'warn');

    const created = await repository.create({
      text_source_id: sourceId,
      url: 'example.com/no-scheme',
    });

    expect(created.url).toBe('example.com/no-scheme');
    expect(warn).toHaveBeenCalledWith('Link URL has no scheme or host', {
      url: 'example.com/no-scheme',
    });
  });

  it('should warn about an unrecognized link type', async () => {
    const warn = jest.spyOn(JSONLogger.prototype, 'warn');

    await repository.create({
      text_source_id: sourceId,
      url: 'https://example.com/x',
      link_type: 'podcast',
    });

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('Unrecognized link type', {
      linkType: 'podcast',
      recognized: RECOGNIZED_LINK_TYPES,
    });
  });
});
