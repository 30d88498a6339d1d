export * from './order-command.input';
export * from './create-order.use-case';
export * from './set-awaiting-validation.use-case';
export * from './confirm-stock.use-case';
export * from './mark-paid.use-case';
export * from './mark-shipped.use-case';
export * from './cancel-order.use-case';
export * from './get-order.use-case';
