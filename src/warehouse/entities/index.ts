import { DimChannelEntity } from './dim-channel.entity';
import { DimCityEntity } from './dim-city.entity';
import { DimCustomerEntity } from './dim-customer.entity';
import { DimDateEntity } from './dim-date.entity';
import { FactTransactionEntity } from './fact-transaction.entity';
import { LoadAuditEntity } from './load-audit.entity';

export {
  DimChannelEntity,
  DimCityEntity,
  DimCustomerEntity,
  DimDateEntity,
  FactTransactionEntity,
  LoadAuditEntity,
};

export const WAREHOUSE_ENTITIES = [
  DimDateEntity,
  DimChannelEntity,
  DimCustomerEntity,
  DimCityEntity,
  FactTransactionEntity,
  LoadAuditEntity,
];
