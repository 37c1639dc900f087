export * from './user-response.dto';
