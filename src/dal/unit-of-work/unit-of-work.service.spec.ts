import { TestingModule } from '@nestjs/testing';
import { ProjectsRepository } from '../../repositories/projects.repository';
import { TextSourcesRepository } from '../../repositories/text-sources.repository';
import { createStoreTestingModule } from '../../testing/store-testing.module';
import { NestedTransactionError, ValidationError } from '../database.errors';
import { UnitOfWorkService } from './unit-of-work.service';

describe('UnitOfWorkService', () => {
  let module: TestingModule;
  let unitOfWork: UnitOfWorkService;
  let projects: ProjectsRepository;
  let textSources: TextSourcesRepository;

  beforeEach(async () => {
    module = await createStoreTestingModule();
    unitOfWork = module.get(UnitOfWorkService);
    projects = module.get(ProjectsRepository);
    textSources = module.get(TextSourcesRepository);
  });

  afterEach(async () => {
    await module.close();
  });

  it('should commit every write when the work succeeds', async () => {
    const sourceId = await unitOfWork.run(async (context) => {
      const project = await projects.create({ name: 'Archive' }, context);
      const source = await textSources.create(
        { project_id: project.id, content: 'hello' },
        context,
      );
      return source.id;
    });

    await expect(projects.count({})).resolves.toBe(1);
    await expect(textSources.getById(sourceId)).resolves.toMatchObject({
      content: 'hello',
    });
  });

  it('should roll back and re-throw the same error when the work fails', async () => {
    const failure = new Error('pipeline aborted');

    await expect(
      unitOfWork.run(async (context) => {
        await projects.create({ name: 'Discarded' }, context);
        throw failure;
      }),
    ).rejects.toBe(failure);

    await expect(projects.count({})).resolves.toBe(0);
  });

  it('should roll back earlier writes when a later write is invalid', async () => {
    await expect(
      unitOfWork.run(async (context) => {
        const project = await projects.create({ name: 'Partial' }, context);
        await textSources.create(
          { project_id: project.id, content: '   ' },
          context,
        );
      }),
    ).rejects.toBeInstanceOf(ValidationError);

    await expect(projects.count({})).resolves.toBe(0);
  });

  it('should refuse to open a scope inside another one', async () => {
    await expect(
      unitOfWork.run(async (context) => {
        await projects.create({ name: 'Outer' }, context);
        return unitOfWork.run(async () => 'inner', context);
      }),
    ).rejects.toBeInstanceOf(NestedTransactionError);

    await expect(projects.count({})).resolves.toBe(0);
  });

  it('should return the value produced by the work', async () => {
    await expect(unitOfWork.run(async () => 'done')).resolves.toBe('done');
  });
});
