export { StorageModule } from './storage.module';
export { StorageService } from './storage.service';
export {
  StorageUploadException,
  StorageReadException,
} from './storage.exceptions';
