import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';

export class AssemblySheetDto {
  /** Part number of the assembly these rows belong to. */
  @IsString()
  @IsNotEmpty()
  partNumber!: string;

  @IsArray()
  @IsObject({ each: true })
  rows!: Record<string, unknown>[];
}

export class LoadBomDto {
  /** Master parts list rows, in declaration order. */
  @IsArray()
  @IsObject({ each: true })
  catalog!: Record<string, unknown>[];

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => AssemblySheetDto)
  assemblies!: AssemblySheetDto[];

  @IsOptional()
  @IsString()
  root?: string;
}
