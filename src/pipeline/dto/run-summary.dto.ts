import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsOptional, IsString, Matches, MaxLength } from 'class-validator';

const REPOSITORY_PATTERN = /^(https:\/\/github\.com\/)?[\w.-]+\/[\w.-]+\/?$/;
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export class PreviewSummaryDto {
  @ApiProperty({ example: 'octo-org/octo-repo', description: '`owner/name` or a github.com URL' })
  @IsString()
  @Matches(REPOSITORY_PATTERN, { message: 'repository must look like owner/name' })
  repository!: string;

  @ApiPropertyOptional({
    example: '2024-03-04',
    description: 'first day to cover; defaults to the day after the newest published summary',
  })
  @IsOptional()
  @Matches(ISO_DATE_PATTERN, { message: 'startDate must be YYYY-MM-DD' })
  startDate?: string;
}

export class RunSummaryDto extends PreviewSummaryDto {
  @ApiPropertyOptional({ description: 'render and summarize without posting' })
  @IsOptional()
  @IsBoolean()
  dryRun?: boolean;

  @ApiPropertyOptional({ example: 'Octo Repo' })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  projectName?: string;

  @ApiPropertyOptional({ example: 'Announcements', description: 'discussion category of published summaries' })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  category?: string;
}
