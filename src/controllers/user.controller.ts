// src/controllers/user.controller.ts
import { Request, Response } from 'express';
import { Services } from '../services';
import { isAuthenticatedRequest } from '../types/request.types';
import { respondWithError } from '../utils/errors';

export const createUserController = ({ users }: Services) => ({
  /**
   * @route   GET api/users/me/deletion-stats
   * @desc    What deleting the account would remove
   * @access  Private
   */
  getDeletionStats: async (req: Request, res: Response): Promise<Response> => {
    if (!isAuthenticatedRequest(req)) {
      return res.status(401).json({ success: false, message: 'Not authorized' });
    }

    try {
      const stats = await users.deletionStats(req.user.id);
      return res.json({ success: true, stats });
    } catch (error) {
      return respondWithError(res, error, 'Deletion stats error', 'Failed to compute deletion stats');
    }
  },

  /**
   * @route   DELETE api/users/me
   * @desc    Delete the account and everything that references it
   * @access  Private
   */
  deleteAccount: async (req: Request, res: Response): Promise<Response> => {
    if (!isAuthenticatedRequest(req)) {
      return res.status(401).json({ success: false, message: 'Not authorized' });
    }

    try {
      const { confirm, password } = req.body;
      const stats = await users.deleteAccount(req.user.id, { confirm, password });

      console.log(`Account ${req.user.username} deleted`);
      return res.json({ success: true, message: 'Account deleted successfully', deletedData: stats });
    } catch (error) {
      return respondWithError(res, error, 'Delete account error', 'Failed to delete account');
    }
  }
});

export type UserController = ReturnType<typeof createUserController>;
