export * from './driver.schema';
export * from './hos.schema';
export * from './trip.schema';
