export { formatStatus, parseStatus, parseStatusLine, IN_SYNC_MESSAGE } from './status.js';
export type { StatusEntry } from './status.js';
export { formatDataTree, formatScalar, truncateValue, NO_DATA_MESSAGE } from './data-tree.js';
export {
  classifyDoctorLine,
  formatDoctor,
  parseDoctor,
  summarizeDoctor,
  NO_DOCTOR_OUTPUT_MESSAGE,
} from './doctor.js';
export type { DoctorEntry, DoctorKind } from './doctor.js';
export { formatManagedFiles, managedTitle, NO_MANAGED_FILES_MESSAGE } from './managed.js';
