import type { SwitchyardRequest } from '../http/request';
import type { SwitchyardResponse } from '../http/response';

import type { View } from './view';

export interface FormatHandler {
  /** Short name, as used by route `format` and `View.format`. */
  readonly format: string;
  readonly mimeTypes: readonly string[];
  render(view: View, request: SwitchyardRequest, format: string): SwitchyardResponse;
}
