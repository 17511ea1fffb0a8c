import { Type } from 'class-transformer';
import {
  IsArray,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';

export class WorkbookSheetDto {
  @IsString()
  name!: string;

  @IsArray()
  @IsObject({ each: true })
  rows!: Record<string, unknown>[];
}

/**
 * Single-workbook layout: the first sheet is the parts list and every
 * later sheet is an assembly named by its part number.
 */
export class LoadWorkbookDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => WorkbookSheetDto)
  sheets!: WorkbookSheetDto[];

  @IsOptional()
  @IsString()
  root?: string;
}
