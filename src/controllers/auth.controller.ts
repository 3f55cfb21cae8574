// src/controllers/auth.controller.ts
import { Request, Response } from 'express';
import { Services } from '../services';
import { isAuthenticatedRequest } from '../types/request.types';
import { respondWithError } from '../utils/errors';

export const createAuthController = ({ users }: Services) => ({
  /**
   * @route   POST api/auth/register
   * @desc    Register a new user
   * @access  Public
   */
  register: async (req: Request, res: Response): Promise<Response> => {
    try {
      const { username, email, password, firstName, lastName } = req.body;
      const { token, user } = await users.register({ username, email, password, firstName, lastName });

      return res.status(201).json({ success: true, token, user });
    } catch (error) {
      return respondWithError(res, error, 'Registration error', 'Server error during registration');
    }
  },

  /**
   * @route   POST api/auth/login
   * @desc    Authenticate user & get token
   * @access  Public
   */
  login: async (req: Request, res: Response): Promise<Response> => {
    try {
      const { email, password } = req.body;
      const { token, user } = await users.authenticate(email, password);

      return res.json({ success: true, token, user });
    } catch (error) {
      return respondWithError(res, error, 'Login error', 'Server error during login');
    }
  },

  /**
   * @route   GET api/auth/me
   * @desc    Get current user
   * @access  Private
   */
  getMe: async (req: Request, res: Response): Promise<Response> => {
    if (!isAuthenticatedRequest(req)) {
      return res.status(401).json({ success: false, message: 'User not found' });
    }
    return res.json({ success: true, user: req.user });
  }
});

export type AuthController = ReturnType<typeof createAuthController>;
