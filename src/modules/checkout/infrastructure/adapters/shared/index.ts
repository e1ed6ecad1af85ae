export { callCollaborator, toFailureOutcome, type CollaboratorRequest } from './collaborator-client';
export { fetchJsonWithTimeout, parseJson, type JsonResponse } from './http-client';
