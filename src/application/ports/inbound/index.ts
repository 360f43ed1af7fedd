export { ICreateOrderPort } from './create-order.port';
export { IManageOrderPort } from './manage-order.port';
export { IManageMenuPort } from './manage-menu.port';
export { IManagePeoplePort } from './manage-people.port';
export { IAuthPort } from './auth.port';
