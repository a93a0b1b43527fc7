/**
 * Model definitions and Zod schemas for the Tasklane control plane
 */

export {
  AccountSchema,
  CreateAccountSchema,
  UpdateAccountSchema,
  type AccountModel,
  type CreateAccountInput,
  type UpdateAccountInput,
  fromDynamoItem as accountFromDynamoItem,
  toDynamoItem as accountToDynamoItem,
} from './account.model.js';

export {
  LedgerEntrySchema,
  PostLedgerEntrySchema,
  ListLedgerQuerySchema,
  buildEntryId,
  type LedgerEntryModel,
  type PostLedgerEntryBody,
  fromDynamoItem as ledgerEntryFromDynamoItem,
  toDynamoItem as ledgerEntryToDynamoItem,
} from './ledger.model.js';

export {
  PriceSchema,
  PriceRowSchema,
  fromPriceRow,
  type PriceModel,
  type PriceRow,
  fromDynamoItem as priceFromDynamoItem,
  toDynamoItem as priceToDynamoItem,
} from './price.model.js';

export {
  JobStatusSchema,
  CreateJobSchema,
  JobSchema,
  ListJobsQuerySchema,
  isActiveStatus,
  type CreateJobInput,
  type CreateJobRequest,
  type JobModel,
  type ListJobsQuery,
  fromDynamoItem as jobFromDynamoItem,
  toDynamoItem as jobToDynamoItem,
} from './job.model.js';

export {
  TaskStateSchema,
  TaskSchema,
  type TaskModel,
  fromDynamoItem as taskFromDynamoItem,
  toDynamoItem as taskToDynamoItem,
} from './task.model.js';
