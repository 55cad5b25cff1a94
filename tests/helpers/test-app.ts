import type { Application } from "express";
import request from "supertest";
import App from "@/app";
import { InMemoryStore, createInMemoryRepositories } from "./in-memory-repositories";

export const API = "/api/v1";

export interface TestApp {
  app: Application;
  store: InMemoryStore;
  db: { ping: () => Promise<void> };
}

export const buildTestApp = (ping: () => Promise<void> = async () => undefined): TestApp => {
  const store = new InMemoryStore();
  const db = { ping };
  const app = new App({ db, repositories: createInMemoryRepositories(store) }).getApp();

  return { app, store, db };
};

export const registerAndLogin = async (
  app: Application,
  email: string = "ana@clinic.test",
  password: string = "p"
): Promise<{ doctorId: number; token: string }> => {
  const registered = await request(app)
    .post(`${API}/auth/register`)
    .send({ name: "Dr. Ana", email, password, specialty: "Cardiology" });

  const loggedIn = await request(app).post(`${API}/auth/login`).send({ email, password });

  return { doctorId: registered.body.data.id, token: loggedIn.body.data.accessToken };
};
