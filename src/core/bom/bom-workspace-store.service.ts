import {
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../../runtime-env';
import { buildBom, DuplicateLink, loadWorkbook } from './bom-builder';
import { BomNode } from './bom-node';
import { Item, WorkbookSheet } from './bom.models';
import {
  AssemblyOverview,
  BomView,
  BomViewResult,
  describeAssemblies,
  distinctAssemblies,
  findAssembly,
  renderView,
} from './bom-views';
import { Catalog } from './catalog';
import { normalizeAssemblyRows, normalizeCatalogRows } from './catalog-records';
import skateboard from './sample-data/skateboard.json';

export interface LoadBomInput {
  catalog: Record<string, unknown>[];
  assemblies: { partNumber: string; rows: Record<string, unknown>[] }[];
  root?: string;
}

export interface LoadWorkbookInput {
  sheets: WorkbookSheet[];
  root?: string;
}

export interface BomWorkspaceSummary {
  id: string;
  rootPartNumber: string;
  rootName: string;
  catalogSize: number;
  assemblyCount: number;
  distinctPartCount: number;
  loadedAt: string;
}

export interface CatalogListing {
  bomId: string;
  fields: string[];
  items: Item[];
}

interface BomWorkspace {
  id: string;
  root: BomNode;
  loadedAt: string;
}

@Injectable()
export class BomWorkspaceStoreService {
  private readonly logger = new Logger(BomWorkspaceStoreService.name);
  private readonly workspacesById = new Map<string, BomWorkspace>();

  private workspaceSequence = 1;

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    if (config.seedSampleData) {
      this.seedSampleData();
    }
  }

  loadBom(input: LoadBomInput): BomWorkspaceSummary {
    const catalog = Catalog.fromRecords(normalizeCatalogRows(input.catalog));
    const root = buildBom({
      catalog,
      assemblies: input.assemblies.map((assembly) =>
        normalizeAssemblyRows(assembly.partNumber, assembly.rows),
      ),
      root: input.root?.trim() || undefined,
      onDuplicateLink: (duplicate) => this.warnDuplicateLink(duplicate),
    });

    return this.register(root);
  }

  loadWorkbook(input: LoadWorkbookInput): BomWorkspaceSummary {
    const root = loadWorkbook(input.sheets, {
      root: input.root?.trim() || undefined,
      onDuplicateLink: (duplicate) => this.warnDuplicateLink(duplicate),
    });

    return this.register(root);
  }

  listBoms(): BomWorkspaceSummary[] {
    return [...this.workspacesById.values()]
      .sort((left, right) => left.id.localeCompare(right.id))
      .map((workspace) => this.toSummary(workspace));
  }

  getBom(bomId: string): BomWorkspaceSummary {
    return this.toSummary(this.requireWorkspace(bomId));
  }

  removeBom(bomId: string): void {
    const workspace = this.requireWorkspace(bomId);
    this.workspacesById.delete(workspace.id);
    this.logger.log(`Removed BOM ${workspace.id} (${workspace.root.partNumber}).`);
  }

  getView(bomId: string, view: BomView, assemblyPartNumber?: string): BomViewResult {
    return renderView(this.requireNode(bomId, assemblyPartNumber), view);
  }

  getAssemblies(bomId: string): AssemblyOverview[] {
    return describeAssemblies(this.requireWorkspace(bomId).root);
  }

  getDirectQuantity(
    bomId: string,
    partNumber: string,
    assemblyPartNumber?: string,
  ): { assemblyPartNumber: string; partNumber: string; quantity: number } {
    const node = this.requireNode(bomId, assemblyPartNumber);

    return {
      assemblyPartNumber: node.partNumber,
      partNumber,
      quantity: node.qty(partNumber),
    };
  }

  getCatalog(bomId: string): CatalogListing {
    const { root } = this.requireWorkspace(bomId);

    return {
      bomId,
      fields: root.catalog.fields,
      items: [...root.catalog.items],
    };
  }

  getCatalogItem(bomId: string, partNumber: string): Item {
    const { root } = this.requireWorkspace(bomId);
    const item = root.catalog.find(partNumber);
    if (!item) {
      throw new NotFoundException(
        `Part '${partNumber}' was not found in the catalog of ${bomId}.`,
      );
    }

    return item;
  }

  private register(root: BomNode): BomWorkspaceSummary {
    const workspace: BomWorkspace = {
      id: this.allocateWorkspaceId(),
      root,
      loadedAt: new Date().toISOString(),
    };

    this.workspacesById.set(workspace.id, workspace);

    const summary = this.toSummary(workspace);
    this.logger.log(
      `Loaded BOM ${summary.id} rooted at ${summary.rootPartNumber} with ${summary.assemblyCount} assemblies.`,
    );

    return summary;
  }

  private requireWorkspace(bomId: string): BomWorkspace {
    const workspace = this.workspacesById.get(bomId);
    if (!workspace) {
      throw new NotFoundException(`BOM '${bomId}' was not found.`);
    }

    return workspace;
  }

  private requireNode(bomId: string, assemblyPartNumber?: string): BomNode {
    const { root } = this.requireWorkspace(bomId);
    if (!assemblyPartNumber) {
      return root;
    }

    const node = findAssembly(root, assemblyPartNumber);
    if (!node) {
      throw new NotFoundException(
        `Assembly '${assemblyPartNumber}' was not found in ${bomId}.`,
      );
    }

    return node;
  }

  private toSummary(workspace: BomWorkspace): BomWorkspaceSummary {
    const { root } = workspace;

    return {
      id: workspace.id,
      rootPartNumber: root.partNumber,
      rootName: root.name,
      catalogSize: root.catalog.size,
      assemblyCount: distinctAssemblies(root).length,
      distinctPartCount: root.aggregate.size,
      loadedAt: workspace.loadedAt,
    };
  }

  private warnDuplicateLink(duplicate: DuplicateLink): void {
    this.logger.warn(
      `Part ${duplicate.partNumber} is declared more than once in ${duplicate.assemblyPartNumber}; summed quantity is ${duplicate.quantity}.`,
    );
  }

  private allocateWorkspaceId(): string {
    const id = `BOM-${String(this.workspaceSequence).padStart(4, '0')}`;
    this.workspaceSequence += 1;
    return id;
  }

  private seedSampleData(): void {
    this.loadWorkbook({ sheets: skateboard.sheets });
  }
}
