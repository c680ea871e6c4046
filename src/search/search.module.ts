import { Module } from '@nestjs/common';
import { IndexModule } from '../index/index.module';
import { SearchService } from './search.service';

@Module({
  imports: [IndexModule],
  providers: [SearchService],
  exports: [SearchService],
})
export class SearchModule {}
