import { Router } from 'express';
import { LobbyCoordinationService, ResponseStatus } from '../domains/lobby-management/application/LobbyCoordinationService';
import { LobbyConnection, PropertyMap } from '../domains/lobby-management/domain/models/LobbyTypes';
import { lobbyIdSchema, validateData } from '../validation/schemas';

// Discovery over HTTP has no connection behind it
const HTTP_REQUESTER: LobbyConnection = {
  id: 'http',
  username: 'anonymous',
  permissionLevel: 0
};

const httpStatusFor = (status: ResponseStatus, errorKind?: string): number => {
  if (status === ResponseStatus.SUCCESS) {
    return 200;
  }
  if (errorKind === 'NotFound') {
    return 404;
  }
  if (status === ResponseStatus.UNAUTHORIZED) {
    return 403;
  }
  return status === ResponseStatus.ERROR ? 500 : 400;
};

export const createRoutes = (lobbyService: LobbyCoordinationService): Router => {
  const router = Router();

  // Discovery feed; query parameters are equality filters on public properties
  router.get('/lobbies', (req, res) => {
    const filters: PropertyMap = {};
    for (const [key, value] of Object.entries(req.query)) {
      if (typeof value === 'string') {
        filters[key] = value;
      }
    }

    const games = lobbyService.getPublicGames(HTTP_REQUESTER, filters);
    res.json({ success: true, games });
  });

  router.get('/lobbies/:lobbyId', (req, res) => {
    const validationResult = validateData(lobbyIdSchema, { lobbyId: req.params.lobbyId });
    if (validationResult.error !== undefined) {
      return res.status(400).json({
        success: false,
        message: 'Invalid request data',
        details: validationResult.error
      });
    }

    const response = lobbyService.getLobbyInfo(null, validationResult.value.lobbyId);
    if (response.status !== ResponseStatus.SUCCESS) {
      return res.status(httpStatusFor(response.status, response.errorKind)).json({
        success: false,
        message: response.message
      });
    }

    return res.json({ success: true, lobby: response.data });
  });

  return router;
};
