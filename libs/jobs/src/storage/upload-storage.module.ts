import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { UploadStorageService } from './upload-storage.service';

/**
 * UploadStorageModule — the upload sandbox on local (or shared) disk.
 *
 * ConfigModule is imported here so UploadStorageService always has
 * ConfigService, even when consumers don't import it themselves.
 */
@Module({
  imports: [ConfigModule],
  providers: [UploadStorageService],
  exports: [UploadStorageService],
})
export class UploadStorageModule {}
