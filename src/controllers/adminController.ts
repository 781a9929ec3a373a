import { Response, NextFunction } from "express";
import { AuthRequest, contextOf } from "../middleware/authMiddleware";
import { ResourceLifecycleCoordinator } from "../services/lifecycleCoordinator";
import { addUserSchema } from "./validation";

export const createAdminController = (
  coordinator: ResourceLifecycleCoordinator
) => {
  const listUsers = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const userIds = await coordinator.listUsers(contextOf(req));
      res.status(200).json({
        users: userIds.map((userId, index) => ({
          index: index + 1,
          userId,
          deleteUrl: `/api/admin/users/${encodeURIComponent(userId)}`,
        })),
      });
    } catch (err) {
      next(err);
    }
  };

  const addUser = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const { error, value } = addUserSchema.validate(req.body);
      if (error) {
        res.status(400).json({ message: error.details[0].message });
        return;
      }

      const userId = await coordinator.addUser(contextOf(req), value.id, value.pw);
      res.status(201).json({ userId });
    } catch (err) {
      next(err);
    }
  };

  const deleteUser = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const report = await coordinator.deleteUser(contextOf(req), req.params.id);
      res.status(200).json(report);
    } catch (err) {
      next(err);
    }
  };

  return { listUsers, addUser, deleteUser };
};
