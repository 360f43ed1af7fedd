export * from './order.dto';
export * from './menu.dto';
export * from './people.dto';
export * from './auth.dto';
