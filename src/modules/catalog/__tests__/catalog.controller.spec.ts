import { Test, TestingModule } from '@nestjs/testing';
import { CatalogController } from '../catalog.controller';
import { CatalogService } from '../catalog.service';

describe('CatalogController', () => {
  let controller: CatalogController;
  let catalogService: jest.Mocked<Pick<CatalogService, 'listStates' | 'listPriorities' | 'listCategories'>>;

  beforeEach(async () => {
    catalogService = {
      listStates: jest.fn(),
      listPriorities: jest.fn(),
      listCategories: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [CatalogController],
      providers: [{ provide: CatalogService, useValue: catalogService }],
    }).compile();

    controller = module.get<CatalogController>(CatalogController);
  });

  it('should delegate each listing to the catalog service', async () => {
    catalogService.listStates.mockResolvedValue([]);
    catalogService.listPriorities.mockResolvedValue([]);
    catalogService.listCategories.mockResolvedValue([]);

    await controller.listStates();
    await controller.listPriorities();
    await controller.listCategories();

    expect(catalogService.listStates).toHaveBeenCalledTimes(1);
    expect(catalogService.listPriorities).toHaveBeenCalledTimes(1);
    expect(catalogService.listCategories).toHaveBeenCalledTimes(1);
  });
});
