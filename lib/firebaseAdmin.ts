import admin from 'firebase-admin'
import type { AppConfig } from './config/env'

let initialized = false

function stringField(value: unknown, key: string) {
  if (typeof value !== 'object' || value === null) return undefined
  const field: unknown = Reflect.get(value, key)
  return typeof field === 'string' ? field : undefined
}

function ensureInit(config: Pick<AppConfig, 'firebaseServiceAccountJson'>) {
  if (initialized) return
  if (!admin.apps.length) {
    const sa = config.firebaseServiceAccountJson
    if (sa) {
      const serviceAccount: unknown = JSON.parse(sa)
      const projectId = stringField(serviceAccount, 'project_id')
      admin.initializeApp({
        credential: admin.credential.cert({
          projectId,
          clientEmail: stringField(serviceAccount, 'client_email'),
          privateKey: stringField(serviceAccount, 'private_key'),
        }),
        projectId,
      })
    } else {
      admin.initializeApp()
    }
  }
  initialized = true
}

export function getAdminDb(config: Pick<AppConfig, 'firebaseServiceAccountJson'>) {
  ensureInit(config)
  return admin.firestore()
}
