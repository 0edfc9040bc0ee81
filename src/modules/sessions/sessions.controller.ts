import type { RequestHandler, Response } from 'express';

import type { SessionTurnResponse } from '../../core/@types';
import type { CreateSessionBody, PostTurnBody } from './sessions.schema';
import { createSessionSchema, postTurnSchema, sessionIdParamSchema } from './sessions.schema';
import { sessionsService } from './sessions.service';

/** A failed tick still returns the last good session, under 503. */
const sendTurnResponse = (res: Response, response: SessionTurnResponse, successStatus: number): void => {
  res.status(response.failure ? 503 : successStatus).json(response);
};

export const createSession: RequestHandler<never, unknown, CreateSessionBody> = async (
  req,
  res,
  next,
) => {
  try {
    const payload = createSessionSchema.parse(req.body);
    const response = await sessionsService.createSession(payload);
    sendTurnResponse(res, response, 201);
  } catch (error: unknown) {
    next(error);
  }
};

export const getSession: RequestHandler<{ id: string }> = (req, res, next) => {
  try {
    const { id } = sessionIdParamSchema.parse(req.params);
    const response = sessionsService.getSession(id);
    res.status(200).json(response);
  } catch (error: unknown) {
    next(error);
  }
};

export const postTurn: RequestHandler<{ id: string }, unknown, PostTurnBody> = async (
  req,
  res,
  next,
) => {
  try {
    const { id } = sessionIdParamSchema.parse(req.params);
    const payload = postTurnSchema.parse(req.body);
    const response = await sessionsService.postTurn(id, payload);
    sendTurnResponse(res, response, 200);
  } catch (error: unknown) {
    next(error);
  }
};

export const postExit: RequestHandler<{ id: string }> = async (req, res, next) => {
  try {
    const { id } = sessionIdParamSchema.parse(req.params);
    const response = await sessionsService.requestExit(id);
    sendTurnResponse(res, response, 200);
  } catch (error: unknown) {
    next(error);
  }
};
