import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { BomsService } from './boms.service';
import { LoadBomDto } from './dto/load-bom.dto';
import { LoadWorkbookDto } from './dto/load-workbook.dto';

@Controller('boms')
export class BomsController {
  constructor(private readonly bomsService: BomsService) {}

  @Post()
  loadBom(@Body() payload: LoadBomDto) {
    return this.bomsService.loadBom(payload);
  }

  @Post('workbook')
  loadWorkbook(@Body() payload: LoadWorkbookDto) {
    return this.bomsService.loadWorkbook(payload);
  }

  @Get()
  listBoms() {
    return this.bomsService.listBoms();
  }

  @Get(':bomId')
  getBom(@Param('bomId') bomId: string) {
    return this.bomsService.getBom(bomId);
  }

  @Delete(':bomId')
  removeBom(@Param('bomId') bomId: string) {
    return this.bomsService.removeBom(bomId);
  }

  @Get(':bomId/views/:view')
  getView(@Param('bomId') bomId: string, @Param('view') view: string) {
    return this.bomsService.getView(bomId, view);
  }

  @Get(':bomId/assemblies')
  getAssemblies(@Param('bomId') bomId: string) {
    return this.bomsService.getAssemblies(bomId);
  }

  @Get(':bomId/assemblies/:partNumber/views/:view')
  getAssemblyView(
    @Param('bomId') bomId: string,
    @Param('partNumber') partNumber: string,
    @Param('view') view: string,
  ) {
    return this.bomsService.getView(bomId, view, partNumber);
  }

  @Get(':bomId/qty/:partNumber')
  getDirectQuantity(
    @Param('bomId') bomId: string,
    @Param('partNumber') partNumber: string,
    @Query('assembly') assembly?: string,
  ) {
    return this.bomsService.getDirectQuantity(bomId, partNumber, assembly);
  }

  @Get(':bomId/catalog')
  getCatalog(@Param('bomId') bomId: string) {
    return this.bomsService.getCatalog(bomId);
  }

  @Get(':bomId/catalog/:partNumber')
  getCatalogItem(
    @Param('bomId') bomId: string,
    @Param('partNumber') partNumber: string,
  ) {
    return this.bomsService.getCatalogItem(bomId, partNumber);
  }
}
