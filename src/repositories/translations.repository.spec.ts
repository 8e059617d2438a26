import { TestingModule } from '@nestjs/testing';
import { NotFoundError, ValidationError } from '../dal/database.errors';
import { createStoreTestingModule } from '../testing/store-testing.module';
import { TranslationToken } from '../types/entities';
import { ProjectsRepository } from './projects.repository';
import { TextSourcesRepository } from './text-sources.repository';
import { TranslationsRepository } from './translations.repository';

function tokens(...words: string[]): TranslationToken[] {
  return words.map((token, pos) => ({ token, pos }));
}

describe('TranslationsRepository', () => {
  let module: TestingModule;
  let repository: TranslationsRepository;
  let projectId: number;
  let sourceId: number;

  beforeEach(async () => {
    module = await createStoreTestingModule();
    repository = module.get(TranslationsRepository);

    const project = await module
      .get(ProjectsRepository)
      .create({ name: 'Signs' });
    const source = await module
      .get(TextSourcesRepository)
      .create({ project_id: project.id, content: 'Good morning everyone' });
    projectId = project.id;
    sourceId = source.id;
  });

  afterEach(async () => {
    await module.close();
  });

  it('should store tokens in order', async () => {
    const created = await repository.create({
      text_source_id: sourceId,
      language_code: 'ase',
      tokens: tokens('MORNING', 'GOOD', 'ALL'),
      original_text: 'Good morning everyone',
    });

    const loaded = await repository.getById(created.id);
    expect(loaded.tokens).toEqual([
      { token: 'MORNING', pos: 0 },
      { token: 'GOOD', pos: 1 },
      { token: 'ALL', pos: 2 },
    ]);
    expect(loaded).toEqual(created);
  });

  const invalidSequences: [string, TranslationToken[]][] = [
    ['positions that do not start at 0', [{ token: 'a', pos: 1 }]],
    [
      'repeated positions',
      [
        { token: 'a', pos: 0 },
        { token: 'b', pos: 0 },
      ],
    ],
    ['an empty token list', []],
  ];

  it.each(invalidSequences)('should reject %s', async (_case, invalid) => {
    const payload = {
      text_source_id: sourceId,
      language_code: 'ase',
      tokens: invalid,
    };

    const attempt = repository.create(payload);

    await expect(attempt).rejects.toBeInstanceOf(ValidationError);
    await expect(attempt).rejects.toMatchObject({ fields: ['tokens'] });
    await expect(repository.count({})).resolves.toBe(0);
  });

  it('should accept consecutive positions from 0', async () => {
    await expect(
      repository.create({
        text_source_id: sourceId,
        language_code: 'ase',
        tokens: [
          { token: 'a', pos: 0 },
          { token: 'b', pos: 1 },
        ],
      }),
    ).resolves.toMatchObject({ language_code: 'ase' });
  });

  it('should check tokens on update too', async () => {
    const { id } = await repository.create({
      text_source_id: sourceId,
      language_code: 'ase',
      tokens: tokens('HELLO'),
    });

    await expect(
      repository.update(id, { tokens: [{ token: 'x', pos: 2 }] }),
    ).rejects.toMatchObject({ fields: ['tokens'] });

    const updated = await repository.update(id, {
      tokens: tokens('HELLO', 'THERE'),
    });
    expect(updated.tokens).toEqual(tokens('HELLO', 'THERE'));
  });

  it('should keep the language fixed once stored', async () => {
    const { id } = await repository.create({
      text_source_id: sourceId,
      language_code: 'ase',
      tokens: tokens('HELLO'),
    });
    const payload = { title: 'Relabelled', language_code: 'fr' };

    await expect(repository.update(id, payload)).rejects.toMatchObject({
      fields: ['language_code'],
    });
    const stored = await repository.getByLanguage(sourceId, 'ase');
    expect(stored).toMatchObject({ id, title: null });
  });

  it('should return the latest translation for a language', async () => {
    await repository.create({
      text_source_id: sourceId,
      language_code: 'ase',
      tokens: tokens('FIRST'),
    });
    const latest = await repository.create({
      text_source_id: sourceId,
      language_code: 'ase',
      tokens: tokens('SECOND'),
    });
    await repository.create({
      text_source_id: sourceId,
      language_code: 'bfi',
      tokens: tokens('OTHER'),
    });

    await expect(repository.getByLanguage(sourceId, 'ase')).resolves.toEqual(
      latest,
    );
    await expect(repository.getByLanguage(sourceId, 'fsl')).resolves.toBeNull();
  });

  it('should list translations of a language across a project', async () => {
    const second = await module
      .get(TextSourcesRepository)
      .create({ project_id: projectId, content: 'Second' });
    const first = await repository.create({
      text_source_id: sourceId,
      language_code: 'ase',
      tokens: tokens('ONE'),
    });
    await repository.create({
      text_source_id: second.id,
      language_code: 'bfi',
      tokens: tokens('TWO'),
    });
    const third = await repository.create({
      text_source_id: second.id,
      language_code: 'ase',
      tokens: tokens('THREE'),
    });

    const found = await repository.getByProjectLanguage(projectId, 'ase');

    expect(found.map((translation) => translation.id)).toEqual([
      first.id,
      third.id,
    ]);
  });

  it('should search original text and tokens', async () => {
    await repository.create({
      text_source_id: sourceId,
      language_code: 'ase',
      tokens: tokens('RAIN', 'TOMORROW'),
      original_text: 'Rain is expected tomorrow',
    });
    await repository.create({
      text_source_id: sourceId,
      language_code: 'bfi',
      tokens: tokens('SUN'),
      original_text: 'Sunny all week',
    });

    const byText = await repository.search('EXPECTED');
    const byToken = await repository.searchTokens('tomorrow');
    const byTokenInLanguage = await repository.searchTokens('sun', 'ase');

    expect(byText.map((translation) => translation.language_code)).toEqual([
      'ase',
    ]);
    expect(byToken.map((translation) => translation.language_code)).toEqual([
      'ase',
    ]);
    expect(byTokenInLanguage).toEqual([]);
  });

  it('should list distinct languages', async () => {
    const other = await module
      .get(TextSourcesRepository)
      .create({ project_id: projectId, content: 'Other' });
    for (const code of ['ase', 'bfi', 'ase']) {
      await repository.create({
        text_source_id: sourceId,
        language_code: code,
        tokens: tokens('X'),
      });
    }
    await repository.create({
      text_source_id: other.id,
      language_code: 'asf',
      tokens: tokens('Y'),
    });

    await expect(repository.getAvailableLanguages()).resolves.toEqual([
      'ase',
      'asf',
      'bfi',
    ]);
    await expect(repository.getAvailableLanguages(sourceId)).resolves.toEqual([
      'ase',
      'bfi',
    ]);
  });

  it('should summarize a token list', async () => {
    const { id } = await repository.create({
      text_source_id: sourceId,
      language_code: 'ase',
      tokens: tokens('GO', 'HOME', 'GO'),
    });

    await expect(repository.getTokenStatistics(id)).resolves.toEqual({
      translation_id: id,
      token_count: 3,
      unique_tokens: 2,
      average_token_length: 8 / 3,
      max_position: 2,
    });
    await expect(repository.getTokenStatistics(id + 1)).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });

  it('should join tokens in position order', () => {
    const text = repository.tokenText({
      tokens: [
        { token: 'world', pos: 1 },
        { token: 'hello', pos: 0 },
      ],
    });

    expect(text).toBe('hello world');
  });
});
