import { readHelpText } from '../../infra/resources/index.js';
import { header } from '../../shared/ui/index.js';

export function helpTab(): void {
  header('Help');
  console.log(readHelpText());
}
