export {
  CollaboratorCallError,
  type CollaboratorErrorCode,
  type CollaboratorErrorContext,
  type CollaboratorName,
} from './collaborator-call.error';
