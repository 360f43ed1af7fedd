export {
  OrderDocument,
  OrderDocumentType,
  OrderSchema,
  OrderLineDocument,
  OrderLineSchema,
} from './order.schema';
export { CoffeeItemDocument, CoffeeItemDocumentType, CoffeeItemSchema } from './coffee-item.schema';
export { CategoryDocument, CategoryDocumentType, CategorySchema } from './category.schema';
export { CustomerDocument, CustomerDocumentType, CustomerSchema } from './customer.schema';
export { BaristaDocument, BaristaDocumentType, BaristaSchema } from './barista.schema';
export { UserDocument, UserDocumentType, UserSchema } from './user.schema';
