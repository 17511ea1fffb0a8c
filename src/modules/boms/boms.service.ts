import { BadRequestException, Injectable } from '@nestjs/common';
import { BomWorkspaceStoreService } from '../../core/bom/bom-workspace-store.service';
import { BOM_VIEWS, BomView, isBomView } from '../../core/bom/bom-views';
import { LoadBomDto } from './dto/load-bom.dto';
import { LoadWorkbookDto } from './dto/load-workbook.dto';

@Injectable()
export class BomsService {
  constructor(private readonly store: BomWorkspaceStoreService) {}

  loadBom(payload: LoadBomDto) {
    return this.store.loadBom({
      catalog: payload.catalog,
      assemblies: payload.assemblies.map((assembly) => ({
        partNumber: assembly.partNumber,
        rows: assembly.rows,
      })),
      root: payload.root,
    });
  }

  loadWorkbook(payload: LoadWorkbookDto) {
    return this.store.loadWorkbook({
      sheets: payload.sheets.map((sheet) => ({
        name: sheet.name,
        rows: sheet.rows,
      })),
      root: payload.root,
    });
  }

  listBoms() {
    return this.store.listBoms();
  }

  getBom(bomId: string) {
    return this.store.getBom(bomId);
  }

  removeBom(bomId: string) {
    this.store.removeBom(bomId);

    return {
      message: 'BOM removed successfully.',
      bomId,
    };
  }

  getView(bomId: string, viewQuery: string, assemblyPartNumber?: string) {
    return this.store.getView(bomId, this.parseView(viewQuery), assemblyPartNumber);
  }

  getAssemblies(bomId: string) {
    return this.store.getAssemblies(bomId);
  }

  getDirectQuantity(bomId: string, partNumber: string, assemblyQuery?: string) {
    const assemblyPartNumber = assemblyQuery?.trim() || undefined;
    return this.store.getDirectQuantity(bomId, partNumber, assemblyPartNumber);
  }

  getCatalog(bomId: string) {
    return this.store.getCatalog(bomId);
  }

  getCatalogItem(bomId: string, partNumber: string) {
    return this.store.getCatalogItem(bomId, partNumber);
  }

  private parseView(viewQuery: string): BomView {
    const view = viewQuery.trim().toLowerCase();
    if (!isBomView(view)) {
      throw new BadRequestException(
        `Unknown view '${viewQuery}'. Expected one of: ${BOM_VIEWS.join(', ')}.`,
      );
    }

    return view;
  }
}
