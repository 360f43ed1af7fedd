export * from './auth.dto';
export * from './menu.dto';
export * from './order.dto';
export * from './people.dto';
